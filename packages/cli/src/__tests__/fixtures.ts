// Placeholder credentials; key bytes are 0x00..0x1f.

export const TOKEN = 'testtoken';
export const ENCODED_KEY = 'AAECAwQFBgcICQoLDA0ODxAREhMUFRYXGBkaGxwdHh8';
export const RECEIVER_ID = 'corp-test-01';

/** payload {"msgtype":"text","text":{"content":"hello"}}, receiver corp-test-01 */
export const EVENT = {
	timestamp: '1700000100',
	nonce: 'nonce7788',
	cipherBody:
		'4j/AuRx71kQlxVlzbpsMWDKSMmkZer2wyvGA7eMiUzPKuEXRGpnip9uSV/3xhO+85YNZ4BWxPlY6H1FV7veCSqXI65psC3qtG6H542fuhWI=',
	signature: '8b00bca461a0043bd871a809732d1d5dd78bda5a',
	plaintext: '{"msgtype":"text","text":{"content":"hello"}}',
} as const;

/** payload "hi", receiver other-corp */
export const OTHER_RECEIVER = {
	timestamp: '1700000200',
	nonce: 'nonce9900',
	cipherBody: '4j/AuRx71kQlxVlzbpsMWEb1n0msm6gIuAVR08BoXIWuI60icUHk/ITETHvIu91z',
	signature: '667ce0afdf515433e3cb8b69695a03bd03c9909e',
} as const;

export const CREDENTIAL_ARGS = ['--token', TOKEN, '--key', ENCODED_KEY] as const;
