export type { CredentialInput } from './credentials.js';
export type { DecryptedMessage, Envelope, SealedReply } from './envelope.js';
export type {
	ChallengeOutcome,
	ChallengeRequest,
	EventOutcome,
	EventRequest,
	HandshakeOutcome,
	RejectionStage,
	RequestRejection,
} from './handshake.js';
export type { KeyMaterial } from './key-material.js';
