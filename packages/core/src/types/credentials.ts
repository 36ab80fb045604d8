export interface CredentialInput {
	readonly token: string;
	/** 43 characters of the base64 alphabet, no trailing `=`. */
	readonly encodedKey: string;
	/** When set, every event must carry exactly this receiver id. */
	readonly expectedReceiverId?: string;
}
