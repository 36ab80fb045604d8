import type { CallbackEvent, CallbackEventHandler, CallbackReply } from '@hookseal/core';
import { Injectable, Logger } from '@nestjs/common';

/**
 * Default handler: records the event type and sends no reply.
 * Deployments bind their own handler to EVENT_HANDLER.
 */
@Injectable()
export class AcknowledgeEventHandler implements CallbackEventHandler {
	private readonly logger = new Logger(AcknowledgeEventHandler.name);

	handle(event: CallbackEvent): CallbackReply {
		const receiver = event.receiverId || '(no receiver)';
		this.logger.log(`Received ${readEventType(event.payload)} event for ${receiver}`);
		return undefined;
	}
}

export function readEventType(payload: Uint8Array): string {
	let parsed: unknown;
	try {
		parsed = JSON.parse(Buffer.from(payload).toString('utf-8'));
	} catch {
		return 'non-json';
	}
	if (typeof parsed !== 'object' || parsed === null) return 'unknown';

	const type = 'msgtype' in parsed ? parsed.msgtype : 'MsgType' in parsed ? parsed.MsgType : undefined;
	return typeof type === 'string' && type.length > 0 ? type : 'unknown';
}
