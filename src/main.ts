import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { setupApp } from './setup-app';

async function bootstrap() {
	const logger = new Logger('Bootstrap');

	try {
		const app = await NestFactory.create<NestExpressApplication>(AppModule, {
			logger: ['error', 'warn', 'log', 'debug', 'verbose'],
		});

		// JSON bodies only carry small DTOs; uploads go through multer
		app.useBodyParser('json', { limit: '1mb' });

		setupApp(app);

		app.enableCors({
			origin: true,
			methods: ['GET', 'POST', 'PUT', 'OPTIONS', 'HEAD'],
			allowedHeaders: ['Content-Type', 'Accept', 'X-Session-Id', 'X-Requested-With'],
		});

		const configService = app.get(ConfigService);
		const port = configService.get<number>('app.port') || 3000;
		const host = process.env.LISTEN_HOST || '0.0.0.0';

		await app.listen(port, host);

		logger.log(`🚀 Application is running on: http://${host}:${port}`);
		logger.log(`📝 API endpoints available at: http://localhost:${port}/api`);
	} catch (error: unknown) {
		logger.error(' Failed to start application', error instanceof Error ? error.stack : String(error));
		process.exit(1);
	}
}

void bootstrap();
