/**
 * AES-256-CBC key pair derived from an encoded key.
 * `iv` is always the first 16 bytes of `key`; peers rely on it.
 */
export interface KeyMaterial {
	readonly key: Buffer; // 32 bytes
	readonly iv: Buffer; // 16 bytes, view over key
}
