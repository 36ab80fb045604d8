import {
	type CallbackEventHandler,
	HandshakeService,
	type RequestRejection,
	type SealedReply,
} from '@hookseal/core';
import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import { EVENT_HANDLER } from './callback.constants.js';
import type { ChallengeQueryDto, EventQueryDto } from './dto/callback-query.dto.js';

interface SignatureParams {
	signature: string;
	timestamp: string;
	nonce: string;
}

@Injectable()
export class CallbackService {
	private readonly logger = new Logger(CallbackService.name);

	constructor(
		@Inject(HandshakeService) private readonly handshake: HandshakeService,
		@Inject(EVENT_HANDLER) private readonly eventHandler: CallbackEventHandler,
	) {}

	/** Returns the decrypted echo bytes for the URL verification request. */
	answerChallenge(query: ChallengeQueryDto): Buffer {
		const outcome = this.handshake.answerChallenge({
			...this.signatureParams(query),
			echostr: query.echostr,
		});
		if (outcome.status === 'rejected') {
			throw this.rejected('challenge', outcome);
		}

		this.logger.log('Answered verification challenge');
		return Buffer.from(outcome.value);
	}

	/** Returns the sealed reply, or undefined when the handler had nothing to say. */
	async receiveEvent(query: EventQueryDto, cipherBody: string): Promise<SealedReply | undefined> {
		const outcome = await this.handshake.handleEvent(
			{ ...this.signatureParams(query), cipherBody },
			this.eventHandler,
		);
		if (outcome.status === 'rejected') {
			throw this.rejected('event', outcome);
		}
		return outcome.value;
	}

	private signatureParams(query: EventQueryDto): SignatureParams {
		const signature = query.msg_signature ?? query.signature;
		if (!signature) {
			throw new BadRequestException('Missing signature parameters');
		}
		return { signature, timestamp: query.timestamp, nonce: query.nonce };
	}

	private rejected(requestKind: string, rejection: RequestRejection): BadRequestException {
		this.logger.warn(`Rejected ${requestKind} at ${rejection.stage}: ${rejection.kind}`);
		return new BadRequestException(rejection.message);
	}
}
