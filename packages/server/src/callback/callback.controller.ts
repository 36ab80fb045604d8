import type { SealedReply } from '@hookseal/core';
import {
	Body,
	Controller,
	Get,
	HttpCode,
	HttpStatus,
	Inject,
	Post,
	Query,
	Res,
} from '@nestjs/common';
import type { Response } from 'express';
import { CallbackService } from './callback.service.js';
import { ChallengeQueryDto, EventQueryDto } from './dto/callback-query.dto.js';
import { EventBodyDto } from './dto/event-body.dto.js';

/** Body senders expect when an event needs no reply. */
export const ACK_BODY = 'success';

const TEXT_PLAIN = 'text/plain; charset=utf-8';

@Controller('callback')
export class CallbackController {
	constructor(@Inject(CallbackService) private readonly callbacks: CallbackService) {}

	/**
	 * URL verification: echo the decrypted echostr as the literal body.
	 * Written to the response directly; Nest would serialize a returned Buffer as JSON.
	 */
	@Get()
	verifyUrl(@Query() query: ChallengeQueryDto, @Res() res: Response): void {
		const echo = this.callbacks.answerChallenge(query);
		res.type(TEXT_PLAIN).send(echo);
	}

	/**
	 * Event delivery: JSON `{ encrypt }` in, sealed JSON reply or `success` out.
	 */
	@Post()
	@HttpCode(HttpStatus.OK)
	async receive(
		@Query() query: EventQueryDto,
		@Body() body: EventBodyDto,
		@Res({ passthrough: true }) res: Response,
	): Promise<SealedReply | string> {
		const reply = await this.callbacks.receiveEvent(query, body.encrypt);
		if (!reply) {
			res.type(TEXT_PLAIN);
			return ACK_BODY;
		}
		return reply;
	}
}
