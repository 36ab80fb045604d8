import { CredentialSet } from '@hookseal/core';

type Env = Readonly<Record<string, string | undefined>>;

const PORT_PATTERN = /^\d+$/;

function requireEnv(env: Env, name: string): string {
	const value = env[name];
	if (!value) throw new Error(`Missing required env var: ${name}`);
	return value;
}

function optionalEnv(env: Env, name: string, fallback: string): string {
	return env[name] || fallback;
}

export interface AppConfig {
	readonly NODE_ENV: string;
	readonly PORT: number;
	readonly BODY_LIMIT: string;

	// Callback credentials
	readonly CALLBACK_TOKEN: string;
	readonly CALLBACK_ENCODING_AES_KEY: string;
	/** Empty when receiver ids are not enforced. */
	readonly CALLBACK_RECEIVER_ID: string;
}

export function parseConfig(env: Env = process.env): AppConfig {
	const portStr = env.PORT;
	const port = portStr ? Number(portStr) : 8080;
	if ((portStr && !PORT_PATTERN.test(portStr)) || port < 1 || port > 65535) {
		throw new Error(`PORT must be a valid port number, got: ${portStr}`);
	}

	return {
		NODE_ENV: optionalEnv(env, 'NODE_ENV', 'development'),
		PORT: port,
		BODY_LIMIT: optionalEnv(env, 'BODY_LIMIT', '1mb'),

		CALLBACK_TOKEN: requireEnv(env, 'CALLBACK_TOKEN'),
		CALLBACK_ENCODING_AES_KEY: requireEnv(env, 'CALLBACK_ENCODING_AES_KEY'),
		CALLBACK_RECEIVER_ID: optionalEnv(env, 'CALLBACK_RECEIVER_ID', '').trim(),
	};
}

export const APP_CONFIG = Symbol('APP_CONFIG');
export const CREDENTIAL_SET = Symbol('CREDENTIAL_SET');

export function createCredentialSet(config: AppConfig): CredentialSet {
	return CredentialSet.create({
		token: config.CALLBACK_TOKEN,
		encodedKey: config.CALLBACK_ENCODING_AES_KEY,
		expectedReceiverId: config.CALLBACK_RECEIVER_ID || undefined,
	});
}
