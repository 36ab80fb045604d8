import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module.js';
import { configureApp, reportStartupFailure } from './app.setup.js';
import { APP_CONFIG, type AppConfig } from './common/config.js';

async function bootstrap() {
	const app = await NestFactory.create<NestExpressApplication>(AppModule);
	const logger = new Logger('Bootstrap');

	const config = app.get<AppConfig>(APP_CONFIG);
	configureApp(app, config);

	await app.listen(config.PORT);
	logger.log(
		`Callback endpoint listening on port ${config.PORT} (receiver id ${config.CALLBACK_RECEIVER_ID ? 'enforced' : 'not enforced'})`,
	);
}

bootstrap().catch(reportStartupFailure);
