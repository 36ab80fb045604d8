export { CallbackErrorKind } from './enums/callback-error-kind.js';
export {
	CallbackError,
	ConfigError,
	FrameError,
	InvalidKeyError,
	PaddingError,
	ReceiverMismatchError,
	SignatureMismatchError,
	isCallbackError,
} from './errors.js';
export {
	ENCODED_KEY_LENGTH,
	IV_LENGTH,
	KEY_LENGTH,
	assertEncodedKey,
	deriveKeyMaterial,
	generateEncodedKey,
} from './key-material.js';
export { computeSignature, verifySignature } from './signature.js';
export {
	BLOCK_SIZE,
	LENGTH_FIELD_SIZE,
	PREFIX_LENGTH,
	decryptMessage,
	encryptMessage,
} from './message-codec.js';
export type { EncryptOptions, RandomSource } from './message-codec.js';
export { CredentialSet } from './credential-set.js';
export { HandshakeService, PUBLIC_REJECTION_MESSAGE } from './handshake.service.js';
export type { HandshakeServiceOptions, SealOptions } from './handshake.service.js';
export type {
	CallbackEvent,
	CallbackEventHandler,
	CallbackReply,
} from './interfaces/index.js';
export type {
	ChallengeOutcome,
	ChallengeRequest,
	CredentialInput,
	DecryptedMessage,
	Envelope,
	EventOutcome,
	EventRequest,
	HandshakeOutcome,
	KeyMaterial,
	RejectionStage,
	RequestRejection,
	SealedReply,
} from './types/index.js';
