import {
	BadRequestException,
	Body,
	Controller,
	Get,
	HttpCode,
	HttpStatus,
	Post,
	Put,
	UploadedFiles,
	UseInterceptors,
} from '@nestjs/common';
import { FileFieldsInterceptor } from '@nestjs/platform-express';
import type { Express } from 'express';
import 'multer';
import { CurrentSession } from '../common/decorators/current-session.decorator';
import {
	ANALYZER_UPLOAD_FIELDS,
	DOCUMENT_MIME_TYPES,
	FILE_SIZE_LIMIT,
	GENERIC_BINARY_MIME_TYPE,
	IMAGE_MIME_TYPES,
} from '../libs/config';
import { UpdateExtractionPromptDto } from '../libs/dto';
import { FileMessage } from '../libs/enums';
import {
	ExtractedSpecView,
	QaResultView,
	SubmitOutcome,
	UploadedBinary,
} from '../libs/types/analyzer/analyzer.type';
import { AnalyzerSession } from '../sessions/analyzer-session';
import { AnalyzerService } from './analyzer.service';
import { presentExtraction } from './presenters/extraction.presenter';
import { presentQaVerdict } from './presenters/qa-result.presenter';

type AnalyzerUploads = {
	image?: Express.Multer.File[];
	document?: Express.Multer.File[];
};

@Controller('analyzer')
export class AnalyzerController {
	constructor(private readonly analyzerService: AnalyzerService) { }

	// ═══════════════════════════════════════════════════════════
	// 🔍 SUBMIT
	// ═══════════════════════════════════════════════════════════

	/**
	 * Run extraction (if the document changed) and the image QA check
	 * POST /api/analyzer/submit
	 *
	 * FormData:
	 * - image (required): JPEG, PNG or WebP photo to check
	 * - document (optional): brand standards PDF
	 */
	@Post('submit')
	@HttpCode(HttpStatus.OK)
	@UseInterceptors(FileFieldsInterceptor(ANALYZER_UPLOAD_FIELDS, { limits: FILE_SIZE_LIMIT }))
	async submit(
		@CurrentSession() session: AnalyzerSession,
		@UploadedFiles() files: AnalyzerUploads = {},
	): Promise<SubmitOutcome> {
		const image = files.image?.[0];
		const document = files.document?.[0];

		return this.analyzerService.submit(session, {
			image: image ? this.toUpload(image, IMAGE_MIME_TYPES, FileMessage.IMAGE_TYPE_INVALID) : undefined,
			document: document ? this.toUpload(document, DOCUMENT_MIME_TYPES, FileMessage.DOCUMENT_TYPE_INVALID) : undefined,
		});
	}

	// ═══════════════════════════════════════════════════════════
	// 📄 SESSION STATE
	// ═══════════════════════════════════════════════════════════

	/**
	 * Cached brand standards extraction, shown on demand
	 * GET /api/analyzer/extraction
	 */
	@Get('extraction')
	getExtraction(@CurrentSession() session: AnalyzerSession): { digest: string; view: ExtractedSpecView } | null {
		const extraction = session.cachedExtraction;
		return extraction ? { digest: extraction.digest, view: presentExtraction(extraction) } : null;
	}

	/**
	 * Latest QA verdict of this session
	 * GET /api/analyzer/result
	 */
	@Get('result')
	getResult(@CurrentSession() session: AnalyzerSession): QaResultView | null {
		const verdict = session.lastVerdict;
		return verdict ? presentQaVerdict(verdict) : null;
	}

	@Get('extraction-prompt')
	getExtractionPrompt(@CurrentSession() session: AnalyzerSession): { prompt: string } {
		return { prompt: session.extractionPrompt };
	}

	/**
	 * Replace this session's extraction system prompt
	 * PUT /api/analyzer/extraction-prompt
	 *
	 * The cached extraction is kept; it is refreshed once a different document is submitted.
	 */
	@Put('extraction-prompt')
	updateExtractionPrompt(
		@CurrentSession() session: AnalyzerSession,
		@Body() dto: UpdateExtractionPromptDto,
	): { prompt: string } {
		session.extractionPrompt = dto.prompt;
		return { prompt: session.extractionPrompt };
	}

	private toUpload(file: Express.Multer.File, allowed: readonly string[], invalidMessage: FileMessage): UploadedBinary {
		const declared = file.mimetype === GENERIC_BINARY_MIME_TYPE ? undefined : file.mimetype;
		if (declared && !allowed.includes(declared)) {
			throw new BadRequestException(invalidMessage);
		}
		return {
			buffer: file.buffer,
			mimeType: declared,
			originalName: file.originalname,
		};
	}
}
