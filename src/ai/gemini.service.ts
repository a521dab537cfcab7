import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GoogleGenAI, Part } from '@google/genai';
import { AIMessage } from '../libs/enums';
import { DEFAULT_ANALYSIS_MODEL } from '../libs/config';
import { LlmContentPart, LlmRequest } from '../libs/types/ai/llm.type';

/**
 * Any failed Gemini call: missing key, transport, auth, quota or an empty answer.
 * The message carries the underlying cause so it can be shown to the user.
 */
export class GeminiServiceError extends Error {
	constructor(message: string, cause?: unknown) {
		super(message, { cause });
		this.name = 'GeminiServiceError';
	}
}

@Injectable()
export class GeminiService {
	private client: GoogleGenAI | null = null;
	private readonly logger = new Logger(GeminiService.name);

	constructor(private readonly configService: ConfigService) { }

	/**
	 * Send one request (system instruction + user parts) and return the trimmed text answer.
	 * No retry and no client-side timeout: the call runs until the SDK resolves or rejects.
	 */
	async generateText(request: LlmRequest): Promise<string> {
		const client = this.getClient();
		const model = this.getModel();
		const startTime = Date.now();

		this.logger.log(`📤 Gemini request (${model}): ${this.describeParts(request.parts)}`);

		let textResponse = '';
		try {
			const response = await client.models.generateContent({
				model,
				contents: [
					{
						role: 'user',
						parts: request.parts.map((part) => this.toGeminiPart(part)),
					},
				],
				config: {
					systemInstruction: request.systemInstruction,
				},
			});

			for (const part of response.candidates?.[0]?.content?.parts ?? []) {
				if (part.text && !part.thought) {
					textResponse += part.text;
				}
			}
		} catch (error: unknown) {
			const errorMessage = error instanceof Error ? error.message : String(error);
			this.logger.error(`❌ Gemini SDK error after ${this.elapsed(startTime)}s: ${errorMessage}`);
			throw new GeminiServiceError(errorMessage, error);
		}

		const text = textResponse.trim();
		if (!text) {
			this.logger.error(`❌ Gemini returned no text after ${this.elapsed(startTime)}s`);
			throw new GeminiServiceError(AIMessage.EMPTY_RESPONSE);
		}

		this.logger.log(`⏱️ Gemini response received in ${this.elapsed(startTime)}s (${text.length} chars)`);
		return text;
	}

	private toGeminiPart(part: LlmContentPart): Part {
		if (part.kind === 'text') {
			return { text: part.text };
		}
		return {
			inlineData: {
				mimeType: part.mimeType,
				data: part.data.toString('base64'),
			},
		};
	}

	private describeParts(parts: LlmContentPart[]): string {
		return parts
			.map((part) => (part.kind === 'text' ? `text(${part.text.length})` : `${part.mimeType}(${part.data.length} bytes)`))
			.join(', ');
	}

	private elapsed(startTime: number): string {
		return ((Date.now() - startTime) / 1000).toFixed(2);
	}

	/**
	 * Get or create the Gemini client.
	 * A missing key is reported as a service failure of the call that needed it.
	 */
	private getClient(): GoogleGenAI {
		if (this.client) {
			return this.client;
		}

		const apiKey = this.configService.get<string | null>('gemini.apiKey');
		if (!apiKey) {
			this.logger.error('❌ GEMINI_API_KEY is missing in environment variables');
			throw new GeminiServiceError(AIMessage.API_KEY_MISSING);
		}

		this.logger.log(`🔑 Using system Gemini API key (${this.maskKey(apiKey)})`);
		this.client = new GoogleGenAI({ apiKey });
		return this.client;
	}

	private maskKey(apiKey: string): string {
		return `${apiKey.substring(0, 4)}****${apiKey.substring(apiKey.length - 4)}`;
	}

	/**
	 * Get current API key status (masked for security)
	 */
	getApiKeyStatus(): { hasSystemKey: boolean; systemKeyMasked: string | null } {
		const apiKey = this.configService.get<string | null>('gemini.apiKey');
		return {
			hasSystemKey: !!apiKey,
			systemKeyMasked: apiKey ? this.maskKey(apiKey) : null,
		};
	}

	getModel(): string {
		return this.configService.get<string>('gemini.model') || DEFAULT_ANALYSIS_MODEL;
	}
}
