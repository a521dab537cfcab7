import { CachedExtraction, ExtractedSpec, QaVerdict } from '../libs/types/analyzer/analyzer.type';

/**
 * State of one interactive session.
 * Holds at most one cached extraction and the latest verdict; both are replaced, never merged.
 */
export class AnalyzerSession {
	private extraction: CachedExtraction | null = null;
	private verdict: QaVerdict | null = null;

	constructor(
		readonly id: string,
		public extractionPrompt: string,
	) { }

	get cachedExtraction(): CachedExtraction | null {
		return this.extraction;
	}

	get extractedSpec(): ExtractedSpec | null {
		return this.extraction?.spec ?? null;
	}

	get lastVerdict(): QaVerdict | null {
		return this.verdict;
	}

	/** True when `digest` needs a fresh extraction. */
	needsExtraction(digest: string): boolean {
		return this.extraction === null || this.extraction.digest !== digest;
	}

	replaceExtraction(extraction: CachedExtraction): void {
		this.extraction = extraction;
	}

	clearExtraction(): void {
		this.extraction = null;
	}

	recordVerdict(verdict: QaVerdict): void {
		this.verdict = verdict;
	}
}
