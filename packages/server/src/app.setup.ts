import { Logger, ValidationPipe } from '@nestjs/common';
import type { NestExpressApplication } from '@nestjs/platform-express';
import type { AppConfig } from './common/config.js';

/** HTTP settings shared by the entry point and in-process app tests. */
export function configureApp(app: NestExpressApplication, config: AppConfig): void {
	app.useBodyParser('json', { limit: config.BODY_LIMIT });

	// Callback senders append their own query parameters; strip them instead of failing.
	app.useGlobalPipes(
		new ValidationPipe({
			whitelist: true,
			forbidNonWhitelisted: false,
			transform: true,
		}),
	);
}

/** Logs a failed startup with its stack and marks the process as failed. */
export function reportStartupFailure(error: unknown, logger = new Logger('Bootstrap')): void {
	if (error instanceof Error) {
		logger.error(error.message, error.stack);
	} else {
		logger.error(`Non-Error thrown during startup: ${String(error)}`);
	}
	process.exitCode = 1;
}
