import { Injectable, Logger } from '@nestjs/common';
import { GeminiService } from '../ai/gemini.service';
import { BRAND_EXTRACTION_USER_INSTRUCTION } from '../ai/prompts/brand-extraction.prompt';
import { DEFAULT_DOCUMENT_MIME_TYPE } from '../libs/config';
import { ExtractedSpec } from '../libs/types/analyzer/analyzer.type';
import { normalizeModelResponse } from './utils/normalize-model-response.util';

export type ExtractionResult = {
	rawText: string;
	spec: ExtractedSpec;
};

@Injectable()
export class DocumentExtractorService {
	private readonly logger = new Logger(DocumentExtractorService.name);

	constructor(private readonly geminiService: GeminiService) { }

	/**
	 * One extraction request for the document. Service failures propagate as GeminiServiceError.
	 */
	async extract(document: Buffer, systemPrompt: string, mimeType: string = DEFAULT_DOCUMENT_MIME_TYPE): Promise<ExtractionResult> {
		this.logger.log(`📄 Extracting brand standards from ${mimeType} (${document.length} bytes)`);

		const rawText = await this.geminiService.generateText({
			systemInstruction: systemPrompt,
			parts: [
				{ kind: 'bytes', data: document, mimeType },
				{ kind: 'text', text: BRAND_EXTRACTION_USER_INSTRUCTION },
			],
		});

		const spec = normalizeModelResponse(rawText);
		if (spec.kind === 'raw') {
			this.logger.warn('⚠️ Extraction answer is not JSON, keeping it as raw text');
		}
		return { rawText, spec };
	}
}
