import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';
import { FrameError, PaddingError, ReceiverMismatchError } from './errors.js';
import type { DecryptedMessage } from './types/envelope.js';
import type { KeyMaterial } from './types/key-material.js';

const ALGORITHM = 'aes-256-cbc';

export const BLOCK_SIZE = 16;
export const PREFIX_LENGTH = 16;
export const LENGTH_FIELD_SIZE = 4;

const HEADER_LENGTH = PREFIX_LENGTH + LENGTH_FIELD_SIZE;
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export type RandomSource = (size: number) => Uint8Array;

export interface EncryptOptions {
	/** Source of the 16-byte frame prefix. Defaults to crypto.randomBytes. */
	random?: RandomSource;
}

function toBytes(value: Uint8Array | string): Buffer {
	return typeof value === 'string' ? Buffer.from(value, 'utf-8') : Buffer.from(value);
}

function decodeCiphertext(cipherBase64: string): Buffer {
	if (!BASE64_PATTERN.test(cipherBase64)) {
		throw new PaddingError('Ciphertext is not valid base64');
	}
	const ciphertext = Buffer.from(cipherBase64, 'base64');
	if (ciphertext.length === 0 || ciphertext.length % BLOCK_SIZE !== 0) {
		throw new PaddingError(
			`Ciphertext length must be a positive multiple of ${BLOCK_SIZE} bytes, got ${ciphertext.length}`,
		);
	}
	return ciphertext;
}

function addPadding(data: Buffer): Buffer {
	// A full block of padding is still added when data is already aligned.
	const padLength = BLOCK_SIZE - (data.length % BLOCK_SIZE);
	return Buffer.concat([data, Buffer.alloc(padLength, padLength)]);
}

function stripPadding(padded: Buffer): Buffer {
	const padLength = padded[padded.length - 1] ?? 0;
	if (padLength < 1 || padLength > BLOCK_SIZE || padLength > padded.length) {
		throw new PaddingError('Invalid padding');
	}
	for (let i = padded.length - padLength; i < padded.length; i++) {
		if (padded[i] !== padLength) {
			throw new PaddingError('Invalid padding');
		}
	}
	return padded.subarray(0, padded.length - padLength);
}

/**
 * Decrypt and unframe a message.
 *
 * Plaintext layout: random(16) | payloadLength(u32 BE) | payload | receiverId
 */
export function decryptMessage(
	keyMaterial: KeyMaterial,
	cipherBase64: string,
	expectedReceiverId?: string,
): DecryptedMessage {
	const ciphertext = decodeCiphertext(cipherBase64);

	const decipher = createDecipheriv(ALGORITHM, keyMaterial.key, keyMaterial.iv);
	decipher.setAutoPadding(false);
	const padded = Buffer.concat([decipher.update(ciphertext), decipher.final()]);

	const plaintext = stripPadding(padded);
	if (plaintext.length < HEADER_LENGTH) {
		throw new FrameError(`Frame must be at least ${HEADER_LENGTH} bytes, got ${plaintext.length}`);
	}

	const payloadLength = plaintext.readUInt32BE(PREFIX_LENGTH);
	if (payloadLength > plaintext.length - HEADER_LENGTH) {
		throw new FrameError('Declared payload length exceeds the frame');
	}

	const payload = plaintext.subarray(HEADER_LENGTH, HEADER_LENGTH + payloadLength);
	const receiverId = plaintext.subarray(HEADER_LENGTH + payloadLength);

	if (
		expectedReceiverId !== undefined &&
		!receiverId.equals(Buffer.from(expectedReceiverId, 'utf-8'))
	) {
		throw new ReceiverMismatchError();
	}

	return {
		payload: new Uint8Array(payload),
		receiverId: new Uint8Array(receiverId),
	};
}

export function encryptMessage(
	keyMaterial: KeyMaterial,
	payload: Uint8Array | string,
	receiverId: Uint8Array | string,
	options: EncryptOptions = {},
): string {
	const random = options.random ?? randomBytes;
	const prefix = random(PREFIX_LENGTH);
	if (prefix.length !== PREFIX_LENGTH) {
		throw new Error(`Random source returned ${prefix.length} bytes, expected ${PREFIX_LENGTH}`);
	}

	const body = toBytes(payload);
	const lengthField = Buffer.alloc(LENGTH_FIELD_SIZE);
	lengthField.writeUInt32BE(body.length);

	const frame = addPadding(Buffer.concat([prefix, lengthField, body, toBytes(receiverId)]));

	const cipher = createCipheriv(ALGORITHM, keyMaterial.key, keyMaterial.iv);
	cipher.setAutoPadding(false);
	return Buffer.concat([cipher.update(frame), cipher.final()]).toString('base64');
}
