import { type CredentialSet, HandshakeService } from '@hookseal/core';
import { Module } from '@nestjs/common';
import { CREDENTIAL_SET } from '../common/config.js';
import { AcknowledgeEventHandler } from './acknowledge-event.handler.js';
import { EVENT_HANDLER } from './callback.constants.js';
import { CallbackController } from './callback.controller.js';
import { CallbackService } from './callback.service.js';

@Module({
	controllers: [CallbackController],
	providers: [
		{
			provide: HandshakeService,
			inject: [CREDENTIAL_SET],
			useFactory: (credentials: CredentialSet) => new HandshakeService(credentials),
		},
		AcknowledgeEventHandler,
		{
			provide: EVENT_HANDLER,
			useExisting: AcknowledgeEventHandler,
		},
		CallbackService,
	],
})
export class CallbackModule {}
