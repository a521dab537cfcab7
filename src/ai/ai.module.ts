import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { GeminiService } from './gemini.service';
import { PromptBuilderService } from './prompt-builder.service';

@Module({
	imports: [ConfigModule],
	providers: [GeminiService, PromptBuilderService],
	exports: [GeminiService, PromptBuilderService],
})
export class AiModule { }
