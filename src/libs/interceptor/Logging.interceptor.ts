import { CallHandler, ExecutionContext, Injectable, Logger, NestInterceptor } from '@nestjs/common';
import type { Request, Response } from 'express';
import { Observable, tap } from 'rxjs';

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
	private readonly logger = new Logger('HTTP');

	intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
		const http = context.switchToHttp();
		const request = http.getRequest<Request>();
		const startTime = Date.now();

		return next.handle().pipe(
			tap({
				next: () => {
					const response = http.getResponse<Response>();
					this.logger.log(`${request.method} ${request.url} ${response.statusCode} - ${Date.now() - startTime}ms`);
				},
				error: (error: unknown) => {
					const reason = error instanceof Error ? error.message : String(error);
					this.logger.warn(`${request.method} ${request.url} failed after ${Date.now() - startTime}ms: ${reason}`);
				},
			}),
		);
	}
}
