export interface CallbackEvent {
	/** Decrypted payload bytes, exactly as framed by the sender. */
	readonly payload: Uint8Array;
	readonly receiverId: string;
	readonly timestamp: string;
	readonly nonce: string;
}

/** Reply bytes (or UTF-8 text) to encrypt back to the sender, or undefined for none. */
export type CallbackReply = Uint8Array | string | undefined;

export interface CallbackEventHandler {
	handle(event: CallbackEvent): Promise<CallbackReply> | CallbackReply;
}
