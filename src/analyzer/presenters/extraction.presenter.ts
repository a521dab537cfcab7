import { CachedExtraction, ExtractedSpecView } from '../../libs/types/analyzer/analyzer.type';

/** Structured specs render as JSON; anything else shows the model's raw text. */
export const presentExtraction = (extraction: CachedExtraction): ExtractedSpecView =>
	extraction.spec.kind === 'structured'
		? { format: 'json', data: extraction.spec.value }
		: { format: 'text', text: extraction.rawText };
