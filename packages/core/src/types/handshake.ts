import type { CallbackErrorKind } from '../enums/callback-error-kind.js';
import type { Envelope, SealedReply } from './envelope.js';

export interface ChallengeRequest {
	readonly signature: string;
	readonly timestamp: string;
	readonly nonce: string;
	readonly echostr: string;
}

export type EventRequest = Envelope;

export type RejectionStage = 'verify' | 'decrypt';

export interface RequestRejection {
	readonly status: 'rejected';
	readonly stage: RejectionStage;
	readonly kind: CallbackErrorKind;
	/** Safe to show to the caller. */
	readonly message: string;
}

export type HandshakeOutcome<T> =
	| { readonly status: 'responded'; readonly value: T }
	| RequestRejection;

export type ChallengeOutcome = HandshakeOutcome<Uint8Array>;

/** `value` is undefined when the handler had nothing to reply. */
export type EventOutcome = HandshakeOutcome<SealedReply | undefined>;
