import { BadRequestException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { FakeGeminiService } from '../../test/fakes/fake-gemini.service';
import { GeminiService } from '../ai/gemini.service';
import { PromptBuilderService } from '../ai/prompt-builder.service';
import { QA_AUDIT_CONTEXT_HEADING, QA_AUDIT_PROMPT } from '../ai/prompts/qa-audit.prompt';
import { AIMessage, ExtractionStatus, FileMessage, NoticeLevel, QaCategory } from '../libs/enums';
import { AnalyzerSession } from '../sessions/analyzer-session';
import { AnalyzerService } from './analyzer.service';
import { DocumentExtractorService } from './document-extractor.service';
import { ImageAuditorService } from './image-auditor.service';
import { computeDocumentDigest } from './utils/document-digest.util';

const EXTRACTION_PROMPT = 'Extract brand requirements as JSON.';

const image = { buffer: Buffer.from('fake-png-bytes'), mimeType: 'image/png' };
const documentD1 = { buffer: Buffer.from('%PDF-1.7 standards v1'), mimeType: 'application/pdf' };
const documentD2 = { buffer: Buffer.from('%PDF-1.7 standards v2'), mimeType: 'application/pdf' };

describe('AnalyzerService', () => {
	let service: AnalyzerService;
	let gemini: FakeGeminiService;
	let session: AnalyzerSession;

	beforeEach(async () => {
		gemini = new FakeGeminiService();
		const moduleRef = await Test.createTestingModule({
			providers: [
				AnalyzerService,
				DocumentExtractorService,
				ImageAuditorService,
				PromptBuilderService,
				{ provide: ConfigService, useValue: new ConfigService({}) },
				{ provide: GeminiService, useValue: gemini },
			],
		}).compile();

		service = moduleRef.get(AnalyzerService);
		session = new AnalyzerSession('session-1', EXTRACTION_PROMPT);
	});

	describe('validation', () => {
		it('rejects a submit without an image and makes no calls', async () => {
			await expect(service.submit(session, { document: documentD1 })).rejects.toThrow(
				new BadRequestException(FileMessage.IMAGE_REQUIRED),
			);
			expect(gemini.requests).toHaveLength(0);
			expect(session.cachedExtraction).toBeNull();
		});

		it('rejects an empty image', async () => {
			await expect(service.submit(session, { image: { buffer: Buffer.alloc(0) } })).rejects.toThrow(
				new BadRequestException(FileMessage.IMAGE_UNREADABLE),
			);
			expect(gemini.requests).toHaveLength(0);
		});
	});

	describe('extraction caching', () => {
		it('extracts a new document before auditing with its spec', async () => {
			const outcome = await service.submit(session, { image, document: documentD1 });

			expect(gemini.requests).toHaveLength(2);
			expect(gemini.requests[0]).toBe(gemini.extractionRequests[0]);
			expect(gemini.extractionRequests[0].systemInstruction).toBe(EXTRACTION_PROMPT);
			expect(gemini.extractionRequests[0].parts[0]).toEqual({
				kind: 'bytes',
				data: documentD1.buffer,
				mimeType: 'application/pdf',
			});
			expect(gemini.auditRequests[0].systemInstruction).toBe(
				QA_AUDIT_PROMPT + QA_AUDIT_CONTEXT_HEADING + '{"BrandName":"Acme Suites","RequiredColors":["#112233"]}',
			);

			expect(session.cachedExtraction?.digest).toBe(computeDocumentDigest(documentD1.buffer));
			expect(outcome.extraction).toEqual({
				status: ExtractionStatus.EXTRACTED,
				view: { format: 'json', data: { BrandName: 'Acme Suites', RequiredColors: ['#112233'] } },
			});
			expect(outcome.notices).toEqual([{ level: NoticeLevel.SUCCESS, message: AIMessage.EXTRACTION_COMPLETE }]);
			expect(outcome.success).toBe(true);
		});

		it('does not extract an unchanged document twice', async () => {
			await service.submit(session, { image, document: documentD1 });
			const outcome = await service.submit(session, { image, document: { ...documentD1, buffer: Buffer.from(documentD1.buffer) } });

			expect(gemini.extractionRequests).toHaveLength(1);
			expect(gemini.auditRequests).toHaveLength(2);
			expect(outcome.extraction).toEqual({ status: ExtractionStatus.CACHED });
			expect(outcome.notices).toEqual([{ level: NoticeLevel.INFO, message: AIMessage.EXTRACTION_REUSED }]);
		});

		it('replaces the cached spec when the document changes', async () => {
			await service.submit(session, { image, document: documentD1 });
			gemini.extractionReply = '{"BrandName": "Harbor Inn"}';

			await service.submit(session, { image, document: documentD2 });

			expect(gemini.extractionRequests).toHaveLength(2);
			expect(session.cachedExtraction).toEqual({
				digest: computeDocumentDigest(documentD2.buffer),
				spec: { kind: 'structured', value: { BrandName: 'Harbor Inn' } },
				rawText: '{"BrandName": "Harbor Inn"}',
			});
		});

		it('clears the cache when extraction fails and audits without context', async () => {
			await service.submit(session, { image, document: documentD1 });
			gemini.failExtraction('quota exceeded');

			const outcome = await service.submit(session, { image, document: documentD2 });

			expect(session.cachedExtraction).toBeNull();
			expect(gemini.auditRequests[1].systemInstruction).toBe(QA_AUDIT_PROMPT);
			expect(outcome.extraction).toEqual({ status: ExtractionStatus.FAILED });
			expect(outcome.notices).toEqual([
				{ level: NoticeLevel.ERROR, message: `${AIMessage.EXTRACTION_FAILED}: quota exceeded` },
			]);
			expect(outcome.success).toBe(true);
		});

		it('audits with the cached spec when no document is attached', async () => {
			await service.submit(session, { image, document: documentD1 });
			const outcome = await service.submit(session, { image });

			expect(gemini.extractionRequests).toHaveLength(1);
			expect(gemini.auditRequests[1].systemInstruction).toBe(gemini.auditRequests[0].systemInstruction);
			expect(outcome.extraction).toEqual({ status: ExtractionStatus.NONE });
		});

		it('passes a raw extraction to the audit verbatim', async () => {
			gemini.extractionReply = '### Visual Identity\n* Navy carpet';

			const outcome = await service.submit(session, { image, document: documentD1 });

			expect(gemini.auditRequests[0].systemInstruction).toBe(
				QA_AUDIT_PROMPT + QA_AUDIT_CONTEXT_HEADING + '### Visual Identity\n* Navy carpet',
			);
			expect(outcome.extraction.view).toEqual({ format: 'text', text: '### Visual Identity\n* Navy carpet' });
		});

		it('skips extraction for an empty document and keeps the cache', async () => {
			await service.submit(session, { image, document: documentD1 });
			const cached = session.cachedExtraction;

			const outcome = await service.submit(session, { image, document: { buffer: Buffer.alloc(0) } });

			expect(gemini.extractionRequests).toHaveLength(1);
			expect(session.cachedExtraction).toBe(cached);
			expect(outcome.extraction).toEqual({ status: ExtractionStatus.UNREADABLE });
			expect(outcome.notices).toEqual([{ level: NoticeLevel.WARNING, message: FileMessage.DOCUMENT_UNREADABLE }]);
		});
	});

	describe('audit', () => {
		it('defaults the image type to JPEG', async () => {
			await service.submit(session, { image: { buffer: image.buffer } });

			expect(gemini.auditRequests[0].parts[0]).toEqual({ kind: 'bytes', data: image.buffer, mimeType: 'image/jpeg' });
			expect(gemini.auditRequests[0].systemInstruction).toBe(QA_AUDIT_PROMPT);
		});

		it('records and presents the verdict', async () => {
			gemini.auditReply = '```json\n{"Issue_Present": true, "Category": "Condition", "Description": "Torn drape", "Resolution": "Replace"}\n```';

			const outcome = await service.submit(session, { image });

			expect(outcome.result).toEqual({
				treatment: 'issue-present',
				tone: 'error',
				category: QaCategory.CONDITION,
				description: 'Torn drape',
				resolution: 'Replace',
			});
			expect(session.lastVerdict).toEqual({
				kind: 'structured',
				issuePresent: true,
				category: QaCategory.CONDITION,
				description: 'Torn drape',
				resolution: 'Replace',
			});
		});

		it('presents unparseable answers as raw text', async () => {
			gemini.auditReply = 'I cannot see the room clearly.';

			const outcome = await service.submit(session, { image });

			expect(outcome.result).toEqual({
				treatment: 'unparsed',
				tone: 'warning',
				heading: 'Unable to Parse JSON',
				rawText: 'I cannot see the room clearly.',
			});
		});

		it('reports a failed audit and keeps the previous verdict', async () => {
			await service.submit(session, { image });
			const previous = session.lastVerdict;
			gemini.failAudit('network unreachable');

			const outcome = await service.submit(session, { image });

			expect(outcome).toEqual({
				success: false,
				notices: [{ level: NoticeLevel.ERROR, message: `${AIMessage.ANALYSIS_FAILED}: network unreachable` }],
				extraction: { status: ExtractionStatus.NONE },
				result: null,
			});
			expect(session.lastVerdict).toBe(previous);
		});

		it('lets unexpected errors propagate', async () => {
			gemini.auditReply = new TypeError('bug');

			await expect(service.submit(session, { image })).rejects.toThrow(TypeError);
		});
	});
});
