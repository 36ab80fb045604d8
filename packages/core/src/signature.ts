import { createHash, timingSafeEqual } from 'node:crypto';

const SHA1_HEX_LENGTH = 40;
const HEX_PATTERN = /^[0-9a-f]+$/;

/**
 * SHA-1 over the four inputs sorted ascending and joined with no separator.
 * Returns lowercase hex.
 */
export function computeSignature(
	token: string,
	timestamp: string,
	nonce: string,
	cipherBody: string,
): string {
	const joined = [token, timestamp, nonce, cipherBody].sort().join('');
	return createHash('sha1').update(joined, 'utf-8').digest('hex');
}

/**
 * Constant-time check of a candidate signature. Never throws.
 */
export function verifySignature(
	candidate: string,
	token: string,
	timestamp: string,
	nonce: string,
	cipherBody: string,
): boolean {
	const normalized = candidate.toLowerCase();
	if (normalized.length !== SHA1_HEX_LENGTH || !HEX_PATTERN.test(normalized)) {
		return false;
	}

	const expected = computeSignature(token, timestamp, nonce, cipherBody);
	return timingSafeEqual(Buffer.from(expected, 'hex'), Buffer.from(normalized, 'hex'));
}
