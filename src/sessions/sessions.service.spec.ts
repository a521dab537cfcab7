import { ConfigService } from '@nestjs/config';
import { PromptBuilderService } from '../ai/prompt-builder.service';
import { BRAND_EXTRACTION_EXTENDED_PROMPT } from '../ai/prompts/brand-extraction.prompt';
import { SessionsService } from './sessions.service';

describe('SessionsService', () => {
	let sessions: SessionsService;

	beforeEach(() => {
		sessions = new SessionsService(new PromptBuilderService(new ConfigService({})));
	});

	it('creates empty sessions with the default extraction prompt', () => {
		const session = sessions.create();

		expect(session.extractionPrompt).toBe(BRAND_EXTRACTION_EXTENDED_PROMPT);
		expect(session.cachedExtraction).toBeNull();
		expect(session.lastVerdict).toBeNull();
		expect(sessions.find(session.id)).toBe(session);
	});

	it('keeps sessions isolated', () => {
		const first = sessions.create();
		const second = sessions.create();

		first.replaceExtraction({ digest: 'd1', spec: { kind: 'raw', text: 'spec' }, rawText: 'spec' });

		expect(second.id).not.toBe(first.id);
		expect(second.cachedExtraction).toBeNull();
	});

	it('forgets removed sessions', () => {
		const session = sessions.create();

		expect(sessions.remove(session.id)).toBe(true);
		expect(sessions.find(session.id)).toBeNull();
		expect(sessions.remove(session.id)).toBe(false);
	});
});
