import {
	type ArgumentsHost,
	Catch,
	type ExceptionFilter,
	HttpException,
	HttpStatus,
	Logger,
} from '@nestjs/common';
import type { Response } from 'express';

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
	private readonly logger = new Logger(GlobalExceptionFilter.name);

	catch(exception: unknown, host: ArgumentsHost): void {
		const ctx = host.switchToHttp();
		const response = ctx.getResponse<Response>();

		let status = HttpStatus.INTERNAL_SERVER_ERROR;
		let message: string | string[] = 'Internal server error';

		if (exception instanceof HttpException) {
			status = exception.getStatus();
			const exResponse = exception.getResponse();

			if (typeof exResponse === 'string') {
				message = exResponse;
			} else {
				const raw = 'message' in exResponse ? exResponse.message : undefined;
				message = isMessage(raw) ? raw : exception.message;
			}
		} else if (exception instanceof Error) {
			this.logger.error(exception.message, exception.stack);
		} else {
			this.logger.error(`Non-Error exception caught: ${String(exception)}`);
		}

		response.status(status).json({
			statusCode: status,
			message,
			timestamp: new Date().toISOString(),
		});
	}
}

// ValidationPipe reports one message per failed constraint.
function isMessage(value: unknown): value is string | string[] {
	return (
		typeof value === 'string' ||
		(Array.isArray(value) && value.every((item) => typeof item === 'string'))
	);
}
