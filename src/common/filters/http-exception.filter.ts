import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import type { Request, Response } from 'express';

type ErrorBody = {
	success: false;
	statusCode: number;
	message: string | string[];
	path: string;
	timestamp: string;
};

/**
 * Writes every error as the same JSON shape.
 * Unknown errors become 500 and are logged with their stack.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
	private readonly logger = new Logger(HttpExceptionFilter.name);

	catch(exception: unknown, host: ArgumentsHost): void {
		const ctx = host.switchToHttp();
		const response = ctx.getResponse<Response>();
		const request = ctx.getRequest<Request>();

		const statusCode = exception instanceof HttpException ? exception.getStatus() : HttpStatus.INTERNAL_SERVER_ERROR;
		const message = this.extractMessage(exception);

		if (statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
			this.logger.error(
				`${request.method} ${request.url} → ${statusCode}: ${JSON.stringify(message)}`,
				exception instanceof Error ? exception.stack : undefined,
			);
		}

		const body: ErrorBody = {
			success: false,
			statusCode,
			message,
			path: request.url,
			timestamp: new Date().toISOString(),
		};
		response.status(statusCode).json(body);
	}

	private extractMessage(exception: unknown): string | string[] {
		if (!(exception instanceof HttpException)) {
			return 'Internal server error';
		}
		const payload = exception.getResponse();
		if (typeof payload === 'string') {
			return payload;
		}
		// ValidationPipe puts the list of constraint messages under `message`
		if ('message' in payload) {
			const { message } = payload;
			if (typeof message === 'string') return message;
			if (Array.isArray(message) && message.every((item) => typeof item === 'string')) return message;
		}
		return exception.message;
	}
}
