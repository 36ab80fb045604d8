import { CallbackErrorKind } from './enums/callback-error-kind.js';

/**
 * Base of the closed set of protocol errors.
 * `fatal` errors block activation of an integration; the rest reject a single request.
 */
export abstract class CallbackError extends Error {
	abstract readonly kind: CallbackErrorKind;

	get fatal(): boolean {
		return this.kind === CallbackErrorKind.CONFIG;
	}

	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

export class ConfigError extends CallbackError {
	readonly kind = CallbackErrorKind.CONFIG;
}

export class InvalidKeyError extends ConfigError {}

export class SignatureMismatchError extends CallbackError {
	readonly kind = CallbackErrorKind.SIGNATURE_MISMATCH;

	constructor() {
		super('Signature does not match');
	}
}

export class PaddingError extends CallbackError {
	readonly kind = CallbackErrorKind.PADDING;
}

export class FrameError extends CallbackError {
	readonly kind = CallbackErrorKind.FRAME;
}

export class ReceiverMismatchError extends CallbackError {
	readonly kind = CallbackErrorKind.RECEIVER_MISMATCH;

	constructor() {
		super('Message is addressed to a different receiver');
	}
}

export function isCallbackError(value: unknown): value is CallbackError {
	return value instanceof CallbackError;
}
