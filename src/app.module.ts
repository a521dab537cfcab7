// src/app.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import appConfig from './config/app.config';
import geminiConfig from './config/gemini.config';
import { AiModule } from './ai/ai.module';
import { SessionsModule } from './sessions/sessions.module';
import { AuthModule } from './auth/auth.module';
import { AnalyzerModule } from './analyzer/analyzer.module';
import { AppController } from './app.controller';
import { AppService } from './app.service';

@Module({
	imports: [
		ConfigModule.forRoot({
			isGlobal: true,
			load: [appConfig, geminiConfig],
		}),

		AiModule,
		SessionsModule,
		AuthModule,
		AnalyzerModule,
	],
	controllers: [AppController],
	providers: [AppService],
})
export class AppModule {}
