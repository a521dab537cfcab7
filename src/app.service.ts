import { Injectable } from '@nestjs/common';
import { GeminiService } from './ai/gemini.service';

export type HealthStatus = {
	status: 'ok';
	gemini: { model: string; hasSystemKey: boolean };
	timestamp: string;
};

@Injectable()
export class AppService {
	constructor(private readonly geminiService: GeminiService) {}

	getHealth(): HealthStatus {
		return {
			status: 'ok',
			gemini: {
				model: this.geminiService.getModel(),
				hasSystemKey: this.geminiService.getApiKeyStatus().hasSystemKey,
			},
			timestamp: new Date().toISOString(),
		};
	}
}
