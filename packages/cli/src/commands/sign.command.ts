import { computeSignature } from '@hookseal/core';
import { Command } from 'commander';
import { type CredentialOptions, resolveToken } from '../credentials.js';
import { fail } from '../theme.js';

interface SignOptions extends CredentialOptions {
	timestamp: string;
	nonce: string;
}

export function signCommand(): Command {
	return new Command('sign')
		.description('Compute the signature of a ciphertext')
		.argument('<cipher>', 'Base64 ciphertext (echostr or encrypt field)')
		.requiredOption('--timestamp <timestamp>', 'Request timestamp')
		.requiredOption('--nonce <nonce>', 'Request nonce')
		.option('--token <token>', 'Callback token (env: CALLBACK_TOKEN)')
		.action((cipher: string, options: SignOptions) => {
			try {
				const token = resolveToken(options);
				console.log(computeSignature(token, options.timestamp, options.nonce, cipher));
			} catch (error: unknown) {
				fail(error);
			}
		});
}
