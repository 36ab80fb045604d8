import { randomBytes } from 'node:crypto';
import { InvalidKeyError } from './errors.js';
import type { KeyMaterial } from './types/key-material.js';

export const ENCODED_KEY_LENGTH = 43;
export const KEY_LENGTH = 32;
export const IV_LENGTH = 16;

const ENCODED_KEY_PATTERN = /^[A-Za-z0-9+/]{43}$/;

// Buffer.from(..., 'base64') skips characters outside the alphabet, so the
// alphabet is checked before decoding.
function decodeEncodedKey(encodedKey: string): Buffer {
	if (encodedKey.length !== ENCODED_KEY_LENGTH) {
		throw new InvalidKeyError(
			`Encoded key must be ${ENCODED_KEY_LENGTH} characters, got ${encodedKey.length}`,
		);
	}
	if (!ENCODED_KEY_PATTERN.test(encodedKey)) {
		throw new InvalidKeyError('Encoded key contains characters outside the base64 alphabet');
	}

	const key = Buffer.from(`${encodedKey}=`, 'base64');
	if (key.length !== KEY_LENGTH) {
		throw new InvalidKeyError(`Encoded key must decode to ${KEY_LENGTH} bytes, got ${key.length}`);
	}
	return key;
}

/** Validate an encoded key without keeping the decoded bytes. */
export function assertEncodedKey(encodedKey: string): void {
	decodeEncodedKey(encodedKey).fill(0);
}

export function deriveKeyMaterial(encodedKey: string): KeyMaterial {
	const key = decodeEncodedKey(encodedKey);
	return {
		key,
		iv: key.subarray(0, IV_LENGTH),
	};
}

/** Fresh random key in the 43-character encoded form. */
export function generateEncodedKey(): string {
	return randomBytes(KEY_LENGTH).toString('base64').slice(0, ENCODED_KEY_LENGTH);
}
