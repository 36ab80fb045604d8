export enum CallbackErrorKind {
	CONFIG = 'config',
	SIGNATURE_MISMATCH = 'signature_mismatch',
	PADDING = 'padding',
	FRAME = 'frame',
	RECEIVER_MISMATCH = 'receiver_mismatch',
}
