import { INestApplication, ValidationPipe } from '@nestjs/common';
import { HttpExceptionFilter } from './common/filters';
import { LoggingInterceptor } from './libs/interceptor/Logging.interceptor';

/**
 * Global pipes, filters, interceptors and prefix shared by bootstrap and the e2e tests.
 */
export function setupApp(app: INestApplication): void {
	// Global exception filter
	app.useGlobalFilters(new HttpExceptionFilter());

	app.useGlobalPipes(
		new ValidationPipe({
			whitelist: true, // Remove unknown properties
			forbidNonWhitelisted: true, // Throw error if unknown properties exist
			transform: true,
			validationError: {
				target: false,
				value: false,
			},
		}),
	);

	// Global logging interceptor
	app.useGlobalInterceptors(new LoggingInterceptor());

	// API prefix
	app.setGlobalPrefix('api');
}
