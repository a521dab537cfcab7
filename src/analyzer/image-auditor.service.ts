import { Injectable, Logger } from '@nestjs/common';
import { GeminiService } from '../ai/gemini.service';
import { PromptBuilderService } from '../ai/prompt-builder.service';
import { QA_AUDIT_USER_INSTRUCTION } from '../ai/prompts/qa-audit.prompt';
import { ExtractedSpec, QaVerdict } from '../libs/types/analyzer/analyzer.type';
import { interpretQaVerdict } from './utils/interpret-qa-verdict.util';
import { normalizeModelResponse } from './utils/normalize-model-response.util';

@Injectable()
export class ImageAuditorService {
	private readonly logger = new Logger(ImageAuditorService.name);

	constructor(
		private readonly geminiService: GeminiService,
		private readonly promptBuilder: PromptBuilderService,
	) { }

	/**
	 * Judge one image against the QA rubric and, when given, the extracted brand standards.
	 */
	async audit(image: Buffer, mimeType: string, context: ExtractedSpec | null): Promise<QaVerdict> {
		const systemInstruction = this.promptBuilder.buildAuditInstruction(context);
		this.logger.log(`🖼️ Auditing ${mimeType} image (${image.length} bytes), brand context: ${context ? context.kind : 'none'}`);

		const rawText = await this.geminiService.generateText({
			systemInstruction,
			parts: [
				{ kind: 'bytes', data: image, mimeType },
				{ kind: 'text', text: QA_AUDIT_USER_INSTRUCTION },
			],
		});

		const verdict = interpretQaVerdict(normalizeModelResponse(rawText), rawText);
		if (verdict.kind === 'unparsed') {
			this.logger.warn('⚠️ QA answer could not be interpreted, returning raw text');
		}
		return verdict;
	}
}
