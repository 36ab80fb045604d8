import { HandshakeService } from '@hookseal/core';
import { Command } from 'commander';
import { type CredentialOptions, resolveCredentials, withCredentialOptions } from '../credentials.js';
import { fail } from '../theme.js';

interface SealCommandOptions extends CredentialOptions {
	timestamp?: string;
	nonce?: string;
}

export function sealCommand(): Command {
	return withCredentialOptions(
		new Command('seal')
			.description('Encrypt and sign a payload the way a callback reply is sent')
			.argument('<payload>', 'UTF-8 payload to encrypt')
			.option('--timestamp <timestamp>', 'Timestamp to sign (default: now)')
			.option('--nonce <nonce>', 'Nonce to sign (default: random)'),
	).action((payload: string, options: SealCommandOptions) => {
		try {
			const handshake = new HandshakeService(resolveCredentials(options));
			const sealed = handshake.sealReply(payload, {
				timestamp: options.timestamp,
				nonce: options.nonce,
			});
			console.log(JSON.stringify(sealed, null, 2));
		} catch (error: unknown) {
			fail(error);
		}
	});
}
