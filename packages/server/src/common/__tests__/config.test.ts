import { InvalidKeyError } from '@hookseal/core';
import { describe, expect, it } from 'vitest';
import { ENCODED_KEY, RECEIVER_ID, TOKEN } from '../../__tests__/fixtures.js';
import { createCredentialSet, parseConfig } from '../config.js';

const baseEnv = {
	CALLBACK_TOKEN: TOKEN,
	CALLBACK_ENCODING_AES_KEY: ENCODED_KEY,
};

describe('parseConfig', () => {
	it('applies defaults for optional values', () => {
		expect(parseConfig(baseEnv)).toEqual({
			NODE_ENV: 'development',
			PORT: 8080,
			BODY_LIMIT: '1mb',
			CALLBACK_TOKEN: TOKEN,
			CALLBACK_ENCODING_AES_KEY: ENCODED_KEY,
			CALLBACK_RECEIVER_ID: '',
		});
	});

	it('reads overrides', () => {
		const config = parseConfig({
			...baseEnv,
			NODE_ENV: 'production',
			PORT: '3000',
			BODY_LIMIT: '256kb',
			CALLBACK_RECEIVER_ID: `  ${RECEIVER_ID} `,
		});

		expect(config.NODE_ENV).toBe('production');
		expect(config.PORT).toBe(3000);
		expect(config.BODY_LIMIT).toBe('256kb');
		expect(config.CALLBACK_RECEIVER_ID).toBe(RECEIVER_ID);
	});

	it.each(['CALLBACK_TOKEN', 'CALLBACK_ENCODING_AES_KEY'])('requires %s', (name) => {
		const env: Record<string, string> = { ...baseEnv };
		delete env[name];
		expect(() => parseConfig(env)).toThrow(`Missing required env var: ${name}`);
	});

	it.each(['abc', '70000', '-1', '0', '8080abc', '80.5', ' 8080'])('rejects PORT=%s', (port) => {
		expect(() => parseConfig({ ...baseEnv, PORT: port })).toThrow(
			`PORT must be a valid port number, got: ${port}`,
		);
	});
});

describe('createCredentialSet', () => {
	it('leaves the receiver id unenforced when empty', () => {
		const credentials = createCredentialSet(parseConfig(baseEnv));
		expect(credentials.expectedReceiverId).toBeUndefined();
	});

	it('enforces a configured receiver id', () => {
		const credentials = createCredentialSet(
			parseConfig({ ...baseEnv, CALLBACK_RECEIVER_ID: RECEIVER_ID }),
		);
		expect(credentials.expectedReceiverId).toBe(RECEIVER_ID);
	});

	it('fails fast on a malformed key', () => {
		const config = parseConfig({ ...baseEnv, CALLBACK_ENCODING_AES_KEY: 'too-short' });
		expect(() => createCredentialSet(config)).toThrow(InvalidKeyError);
	});
});
