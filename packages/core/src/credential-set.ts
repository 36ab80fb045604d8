import { ConfigError } from './errors.js';
import { IV_LENGTH, assertEncodedKey, deriveKeyMaterial } from './key-material.js';
import type { CredentialInput } from './types/credentials.js';
import type { KeyMaterial } from './types/key-material.js';

const TOKEN_PATTERN = /^[A-Za-z0-9]{1,32}$/;

/**
 * Immutable credentials of one callback integration.
 * Validated when created; key material is derived on first use and cached.
 * The cached bytes never leave the set: callers get copies.
 */
export class CredentialSet {
	readonly token: string;
	readonly encodedKey: string;
	readonly expectedReceiverId: string | undefined;
	private derived: KeyMaterial | undefined;

	private constructor(input: CredentialInput) {
		this.token = input.token;
		this.encodedKey = input.encodedKey;
		this.expectedReceiverId = input.expectedReceiverId;
	}

	static create(input: CredentialInput): CredentialSet {
		if (!TOKEN_PATTERN.test(input.token)) {
			throw new ConfigError('Token must be 1-32 ASCII letters or digits');
		}
		assertEncodedKey(input.encodedKey);
		if (input.expectedReceiverId !== undefined && input.expectedReceiverId.trim() === '') {
			throw new ConfigError('Expected receiver id must not be blank when set');
		}
		return new CredentialSet(input);
	}

	get keyMaterial(): KeyMaterial {
		if (!this.derived) {
			this.derived = deriveKeyMaterial(this.encodedKey);
		}
		const key = Buffer.from(this.derived.key);
		return { key, iv: key.subarray(0, IV_LENGTH) };
	}
}
