// Vectors produced with openssl (aes-256-cbc, -nopad) and sha1 over sorted
// inputs, independently of this package. Key bytes are 0x00..0x1f.

export const TOKEN = 'testtoken';
export const ENCODED_KEY = 'AAECAwQFBgcICQoLDA0ODxAREhMUFRYXGBkaGxwdHh8';
export const RECEIVER_ID = 'corp-test-01';
export const FIXED_PREFIX = Buffer.from('0123456789abcdef', 'utf-8');

/** Always returns the fixed prefix, so encryption is reproducible. */
export const fixedRandom = (size: number): Uint8Array => FIXED_PREFIX.subarray(0, size);

export const CHALLENGE = {
	timestamp: '1700000000',
	nonce: 'nonce5521',
	echostr: '4j/AuRx71kQlxVlzbpsMWPQ13TIaBsxjf1NdKzlJd40ED07G3//HSgL61J/XtgVs',
	signature: '095ba67e03c1cabc251456be4f1a63c1c97f8d98',
	plaintext: 'echo-4417',
} as const;

export const EVENT = {
	timestamp: '1700000100',
	nonce: 'nonce7788',
	cipherBody:
		'4j/AuRx71kQlxVlzbpsMWDKSMmkZer2wyvGA7eMiUzPKuEXRGpnip9uSV/3xhO+85YNZ4BWxPlY6H1FV7veCSqXI65psC3qtG6H542fuhWI=',
	signature: '8b00bca461a0043bd871a809732d1d5dd78bda5a',
	plaintext: '{"msgtype":"text","text":{"content":"hello"}}',
} as const;

/** payload "hi", receiver "other-corp" */
export const OTHER_RECEIVER = {
	timestamp: '1700000200',
	nonce: 'nonce9900',
	cipherBody: '4j/AuRx71kQlxVlzbpsMWEb1n0msm6gIuAVR08BoXIWuI60icUHk/ITETHvIu91z',
	signature: '667ce0afdf515433e3cb8b69695a03bd03c9909e',
} as const;

/** One block decrypting to 10 bytes plus valid padding: too short for a frame. */
export const SHORT_FRAME = {
	timestamp: '1700000300',
	nonce: 'nonce1',
	cipherBody: 'nvmETcB7/ZVWBXRAcrm7YQ==',
	signature: '07f377cd978f2f4a0d33ca7e8712e30b3207a061',
} as const;

export const BAD_CIPHERTEXTS = {
	/** last plaintext byte 0x00 */
	zeroPad: 'z8bbE36RpJtRsxvOGnsPD/eWqkFU+ixsFDcQ/NFNU2U=',
	/** last plaintext byte 0x11 */
	oversizedPad: 'z8bbE36RpJtRsxvOGnsPD3P2vnVIi4Uh66pVOXB3GeY=',
	/** last byte 0x05 but the fifth-from-last byte is 0x01 */
	inconsistentPad: 'z8bbE36RpJtRsxvOGnsPD6F0UL0RzREoazOxoIX8XLU=',
	/** declared payload length 1000 with 3 payload bytes */
	lengthOverflow: '4j/AuRx71kQlxVlzbpsMWCz8ZLeWBZKCNBeIiGiPJ1I=',
} as const;

/** Encrypted under key bytes 0x01..0x20; decrypts under ENCODED_KEY to a valid pad and a huge length field. */
export const FOREIGN_KEY_CIPHERTEXT =
	'Al31VOORMRWx6emIpmL5qrmCkB3mBs07dkZXU6j4klEU8nY5gkxdIJO/OFgtVPXy';

/** Sample URL-verification request from the protocol's public documentation. */
export const PUBLISHED_CHALLENGE = {
	token: 'QDG6eK',
	encodedKey: 'jWmYm7qr5nMoAUwZRjGtBxmz3KA1tkAj3ykkR6q2B2C',
	timestamp: '1409659589',
	nonce: '263014780',
	echostr:
		'P9nAzCzyDtyTWESHep1vC5X9xho/qYX3Zpb4yKa9SKld1DsH3Iyt3tP3zNdtp+4RPcs8TgAE7OaBO+FZXvnaqQ==',
	signature: '5c45ff5e21c57e6ad56bac8758b79b1d9ac89fd3',
	plaintext: '1616140317555161061',
	receiverId: 'wx5823bf96d3bd56c7',
} as const;
