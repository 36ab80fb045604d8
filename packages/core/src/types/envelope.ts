export interface Envelope {
	readonly signature: string; // hex
	readonly timestamp: string;
	readonly nonce: string;
	readonly cipherBody: string; // base64
}

export interface DecryptedMessage {
	readonly payload: Uint8Array;
	readonly receiverId: Uint8Array;
}

/** Encrypted reply in the shape callback senders expect back. */
export interface SealedReply {
	readonly encrypt: string;
	readonly msgsignature: string;
	readonly timestamp: string;
	readonly nonce: string;
}
