import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { GeminiServiceError } from '../ai/gemini.service';
import { DEFAULT_IMAGE_MIME_TYPE, GENERIC_BINARY_MIME_TYPE } from '../libs/config';
import { AIMessage, ExtractionStatus, FileMessage, NoticeLevel } from '../libs/enums';
import {
	ExtractedSpecView,
	Notice,
	QaResultView,
	SubmitInput,
	SubmitOutcome,
	UploadedBinary,
} from '../libs/types/analyzer/analyzer.type';
import { AnalyzerSession } from '../sessions/analyzer-session';
import { DocumentExtractorService } from './document-extractor.service';
import { ImageAuditorService } from './image-auditor.service';
import { presentExtraction } from './presenters/extraction.presenter';
import { presentQaVerdict } from './presenters/qa-result.presenter';
import { computeDocumentDigest } from './utils/document-digest.util';

type ExtractionStep = {
	status: ExtractionStatus;
	view?: ExtractedSpecView;
};

@Injectable()
export class AnalyzerService {
	private readonly logger = new Logger(AnalyzerService.name);

	constructor(
		private readonly documentExtractor: DocumentExtractorService,
		private readonly imageAuditor: ImageAuditorService,
	) { }

	/**
	 * Single submit: extract the document when its digest is new, then always audit the image.
	 * Steps run strictly in sequence; Gemini failures become notices and never escape.
	 */
	async submit(session: AnalyzerSession, input: SubmitInput): Promise<SubmitOutcome> {
		if (!input.image) {
			throw new BadRequestException(FileMessage.IMAGE_REQUIRED);
		}
		if (input.image.buffer.length === 0) {
			throw new BadRequestException(FileMessage.IMAGE_UNREADABLE);
		}
		const imageMime = this.resolveImageMime(input.image);
		this.logger.log(`🔍 Submit for session ${session.id}: image ${input.image.originalName ?? imageMime}, document ${input.document ? 'attached' : 'none'}`);

		const notices: Notice[] = [];
		const extraction = input.document
			? await this.runExtraction(session, input.document, notices)
			: { status: ExtractionStatus.NONE };

		let result: QaResultView | null = null;
		try {
			const verdict = await this.imageAuditor.audit(input.image.buffer, imageMime, session.extractedSpec);
			session.recordVerdict(verdict);
			result = presentQaVerdict(verdict);
		} catch (error: unknown) {
			if (!(error instanceof GeminiServiceError)) throw error;
			this.logger.error(`❌ Image analysis failed for session ${session.id}: ${error.message}`);
			notices.push({ level: NoticeLevel.ERROR, message: `${AIMessage.ANALYSIS_FAILED}: ${error.message}` });
		}

		return {
			success: result !== null,
			notices,
			extraction,
			result,
		};
	}

	private async runExtraction(session: AnalyzerSession, document: UploadedBinary, notices: Notice[]): Promise<ExtractionStep> {
		if (document.buffer.length === 0) {
			notices.push({ level: NoticeLevel.WARNING, message: FileMessage.DOCUMENT_UNREADABLE });
			return { status: ExtractionStatus.UNREADABLE };
		}

		const digest = computeDocumentDigest(document.buffer);
		if (!session.needsExtraction(digest)) {
			this.logger.log(`♻️ Reusing extraction for digest ${digest.substring(0, 12)}`);
			notices.push({ level: NoticeLevel.INFO, message: AIMessage.EXTRACTION_REUSED });
			return { status: ExtractionStatus.CACHED };
		}

		try {
			const { rawText, spec } = await this.documentExtractor.extract(
				document.buffer,
				session.extractionPrompt,
				document.mimeType || undefined,
			);
			const cached = { digest, spec, rawText };
			session.replaceExtraction(cached);
			notices.push({ level: NoticeLevel.SUCCESS, message: AIMessage.EXTRACTION_COMPLETE });
			return { status: ExtractionStatus.EXTRACTED, view: presentExtraction(cached) };
		} catch (error: unknown) {
			if (!(error instanceof GeminiServiceError)) throw error;
			// A failed extraction must not leave the previous document's spec behind
			session.clearExtraction();
			this.logger.error(`❌ Extraction failed for session ${session.id}: ${error.message}`);
			notices.push({ level: NoticeLevel.ERROR, message: `${AIMessage.EXTRACTION_FAILED}: ${error.message}` });
			return { status: ExtractionStatus.FAILED };
		}
	}

	private resolveImageMime(image: UploadedBinary): string {
		const declared = image.mimeType?.trim();
		return declared && declared !== GENERIC_BINARY_MIME_TYPE ? declared : DEFAULT_IMAGE_MIME_TYPE;
	}
}
