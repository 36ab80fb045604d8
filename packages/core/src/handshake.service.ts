import { randomInt } from 'node:crypto';
import type { CredentialSet } from './credential-set.js';
import { CallbackError, SignatureMismatchError } from './errors.js';
import type { CallbackEventHandler } from './interfaces/event-handler.interface.js';
import { type RandomSource, decryptMessage, encryptMessage } from './message-codec.js';
import { computeSignature, verifySignature } from './signature.js';
import type { DecryptedMessage, SealedReply } from './types/envelope.js';
import type {
	ChallengeOutcome,
	ChallengeRequest,
	EventOutcome,
	EventRequest,
	HandshakeOutcome,
	RejectionStage,
	RequestRejection,
} from './types/handshake.js';

export const PUBLIC_REJECTION_MESSAGE = 'Invalid callback request';

const NONCE_LENGTH = 10;

export interface HandshakeServiceOptions {
	/** Milliseconds since epoch; used for reply timestamps. */
	now?: () => number;
	/** Source of the frame prefix for encrypted replies. */
	random?: RandomSource;
}

export interface SealOptions {
	timestamp?: string;
	nonce?: string;
	/** Defaults to the configured receiver id, or empty when none is configured. */
	receiverId?: Uint8Array | string;
}

function reject(stage: RejectionStage, error: unknown): RequestRejection {
	// Anything that is not a protocol error is a bug, not a rejection.
	if (!(error instanceof CallbackError)) throw error;
	return {
		status: 'rejected',
		stage,
		kind: error.kind,
		message: PUBLIC_REJECTION_MESSAGE,
	};
}

function generateNonce(): string {
	let nonce = '';
	for (let i = 0; i < NONCE_LENGTH; i++) {
		nonce += randomInt(10).toString();
	}
	return nonce;
}

/**
 * Runs the two callback request kinds against one credential set.
 * Stateless per request: Received -> Authenticated -> Decoded -> Responded,
 * or Rejected at the first failing step.
 */
export class HandshakeService {
	private readonly now: () => number;
	private readonly random: RandomSource | undefined;

	constructor(
		private readonly credentials: CredentialSet,
		options: HandshakeServiceOptions = {},
	) {
		this.now = options.now ?? Date.now;
		this.random = options.random;
	}

	/** Setup probe: prove possession of the key by echoing the decrypted echostr. */
	answerChallenge(request: ChallengeRequest): ChallengeOutcome {
		const verified = this.authenticate(
			request.signature,
			request.timestamp,
			request.nonce,
			request.echostr,
		);
		if (verified) return verified;

		try {
			const { payload } = decryptMessage(this.credentials.keyMaterial, request.echostr);
			return { status: 'responded', value: payload };
		} catch (error) {
			return reject('decrypt', error);
		}
	}

	/** Authenticate and decrypt an event body, enforcing the receiver id when configured. */
	openEvent(request: EventRequest): HandshakeOutcome<DecryptedMessage> {
		const verified = this.authenticate(
			request.signature,
			request.timestamp,
			request.nonce,
			request.cipherBody,
		);
		if (verified) return verified;

		try {
			const message = decryptMessage(
				this.credentials.keyMaterial,
				request.cipherBody,
				this.credentials.expectedReceiverId,
			);
			return { status: 'responded', value: message };
		} catch (error) {
			return reject('decrypt', error);
		}
	}

	sealReply(reply: Uint8Array | string, options: SealOptions = {}): SealedReply {
		const timestamp = options.timestamp ?? Math.floor(this.now() / 1000).toString();
		const nonce = options.nonce ?? generateNonce();
		const receiverId = options.receiverId ?? this.credentials.expectedReceiverId ?? '';

		const encrypt = encryptMessage(this.credentials.keyMaterial, reply, receiverId, {
			random: this.random,
		});

		return {
			encrypt,
			msgsignature: computeSignature(this.credentials.token, timestamp, nonce, encrypt),
			timestamp,
			nonce,
		};
	}

	async handleEvent(request: EventRequest, handler: CallbackEventHandler): Promise<EventOutcome> {
		const opened = this.openEvent(request);
		if (opened.status === 'rejected') return opened;

		const { payload, receiverId } = opened.value;
		const reply = await handler.handle({
			payload,
			receiverId: Buffer.from(receiverId).toString('utf-8'),
			timestamp: request.timestamp,
			nonce: request.nonce,
		});

		if (reply === undefined) {
			return { status: 'responded', value: undefined };
		}
		return { status: 'responded', value: this.sealReply(reply, { receiverId }) };
	}

	private authenticate(
		signature: string,
		timestamp: string,
		nonce: string,
		cipherBody: string,
	): RequestRejection | undefined {
		const ok = verifySignature(signature, this.credentials.token, timestamp, nonce, cipherBody);
		return ok ? undefined : reject('verify', new SignatureMismatchError());
	}
}
