import { CredentialSet } from '@hookseal/core';
import type { Command } from 'commander';

type Env = Readonly<Record<string, string | undefined>>;

export interface CredentialOptions {
	token?: string;
	key?: string;
	receiver?: string;
}

/** Adds the credential flags shared by every command that needs a secret. */
export function withCredentialOptions(command: Command): Command {
	return command
		.option('--token <token>', 'Callback token (env: CALLBACK_TOKEN)')
		.option('--key <encodedKey>', '43-char encoding AES key (env: CALLBACK_ENCODING_AES_KEY)')
		.option('--receiver <id>', 'Receiver id (env: CALLBACK_RECEIVER_ID)');
}

export function resolveToken(options: CredentialOptions, env: Env = process.env): string {
	const token = options.token ?? env.CALLBACK_TOKEN;
	if (!token) {
		throw new Error('Missing token: pass --token or set CALLBACK_TOKEN');
	}
	return token;
}

/** Flags win over the environment. An empty receiver id means none. */
export function resolveCredentials(options: CredentialOptions, env: Env = process.env): CredentialSet {
	const encodedKey = options.key ?? env.CALLBACK_ENCODING_AES_KEY;
	if (!encodedKey) {
		throw new Error('Missing key: pass --key or set CALLBACK_ENCODING_AES_KEY');
	}
	const receiver = options.receiver ?? env.CALLBACK_RECEIVER_ID;

	return CredentialSet.create({
		token: resolveToken(options, env),
		encodedKey,
		expectedReceiverId: receiver?.trim() ? receiver.trim() : undefined,
	});
}
