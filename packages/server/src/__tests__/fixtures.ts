// Shared callback vectors (key bytes 0x00..0x1f, produced with openssl).

export const TOKEN = 'testtoken';
export const ENCODED_KEY = 'AAECAwQFBgcICQoLDA0ODxAREhMUFRYXGBkaGxwdHh8';
export const RECEIVER_ID = 'corp-test-01';

export const CHALLENGE = {
	msg_signature: '095ba67e03c1cabc251456be4f1a63c1c97f8d98',
	timestamp: '1700000000',
	nonce: 'nonce5521',
	echostr: '4j/AuRx71kQlxVlzbpsMWPQ13TIaBsxjf1NdKzlJd40ED07G3//HSgL61J/XtgVs',
} as const;

export const EVENT = {
	msg_signature: '8b00bca461a0043bd871a809732d1d5dd78bda5a',
	timestamp: '1700000100',
	nonce: 'nonce7788',
	encrypt:
		'4j/AuRx71kQlxVlzbpsMWDKSMmkZer2wyvGA7eMiUzPKuEXRGpnip9uSV/3xhO+85YNZ4BWxPlY6H1FV7veCSqXI65psC3qtG6H542fuhWI=',
	plaintext: '{"msgtype":"text","text":{"content":"hello"}}',
} as const;

/** Payload "hi" addressed to receiver "other-corp". */
export const OTHER_RECEIVER_EVENT = {
	msg_signature: '667ce0afdf515433e3cb8b69695a03bd03c9909e',
	timestamp: '1700000200',
	nonce: 'nonce9900',
	encrypt: '4j/AuRx71kQlxVlzbpsMWEb1n0msm6gIuAVR08BoXIWuI60icUHk/ITETHvIu91z',
} as const;
