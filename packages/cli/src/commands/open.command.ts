import { HandshakeService } from '@hookseal/core';
import { Command } from 'commander';
import { type CredentialOptions, resolveCredentials, withCredentialOptions } from '../credentials.js';
import { fail } from '../theme.js';

interface OpenOptions extends CredentialOptions {
	signature: string;
	timestamp: string;
	nonce: string;
}

export function openCommand(): Command {
	return withCredentialOptions(
		new Command('open')
			.description('Verify and decrypt a callback ciphertext')
			.argument('<cipher>', 'Base64 ciphertext')
			.requiredOption('--signature <signature>', 'msg_signature of the request')
			.requiredOption('--timestamp <timestamp>', 'Request timestamp')
			.requiredOption('--nonce <nonce>', 'Request nonce'),
	).action((cipher: string, options: OpenOptions) => {
		try {
			const handshake = new HandshakeService(resolveCredentials(options));
			const outcome = handshake.openEvent({
				signature: options.signature,
				timestamp: options.timestamp,
				nonce: options.nonce,
				cipherBody: cipher,
			});
			if (outcome.status === 'rejected') {
				fail(`Rejected at ${outcome.stage}: ${outcome.kind}`);
				return;
			}
			console.log(Buffer.from(outcome.value.payload).toString('utf-8'));
		} catch (error: unknown) {
			fail(error);
		}
	});
}
