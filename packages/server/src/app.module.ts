import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { CallbackModule } from './callback/callback.module.js';
import { ConfigModule } from './common/config.module.js';
import { GlobalExceptionFilter } from './common/global-exception.filter.js';
import { HealthController } from './health.controller.js';

@Module({
	imports: [ConfigModule, CallbackModule],
	controllers: [HealthController],
	providers: [
		{
			provide: APP_FILTER,
			useClass: GlobalExceptionFilter,
		},
	],
})
export class AppModule {}
