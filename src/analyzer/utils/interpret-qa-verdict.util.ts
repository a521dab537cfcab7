import { QaCategory } from '../../libs/enums';
import { JsonValue, NormalizedResponse, QaVerdict } from '../../libs/types/analyzer/analyzer.type';

const KNOWN_CATEGORIES = [QaCategory.CONDITION, QaCategory.CLEANLINESS, QaCategory.COMPLIANCE];

export const DEFAULT_DESCRIPTION = 'No description provided.';
export const DEFAULT_RESOLUTION = 'No resolution provided.';

/**
 * Missing or null means no issue; anything that is not explicitly false counts as an issue.
 */
const readIssuePresent = (value: JsonValue | undefined): boolean => {
	if (value === undefined || value === null) return false;
	if (typeof value === 'boolean') return value;
	if (typeof value === 'string') {
		const normalized = value.trim().toLowerCase();
		if (normalized === 'false') return false;
		if (normalized === 'true') return true;
	}
	return true;
};

const readCategory = (value: JsonValue | undefined): QaCategory => {
	if (typeof value !== 'string') return QaCategory.UNKNOWN;
	const normalized = value.trim().toLowerCase();
	return KNOWN_CATEGORIES.find((category) => category.toLowerCase() === normalized) ?? QaCategory.UNKNOWN;
};

const readText = (value: JsonValue | undefined, fallback: string): string =>
	typeof value === 'string' && value.trim() ? value : fallback;

/**
 * Read a normalized audit response as a verdict.
 * Anything other than a JSON object degrades to `unparsed` with the original response text.
 */
export const interpretQaVerdict = (response: NormalizedResponse, rawText: string): QaVerdict => {
	if (response.kind === 'raw' || Array.isArray(response.value)) {
		return { kind: 'unparsed', text: rawText };
	}

	const value = response.value;
	return {
		kind: 'structured',
		issuePresent: readIssuePresent(value.Issue_Present ?? value.IssuePresent),
		category: readCategory(value.Category),
		description: readText(value.Description, DEFAULT_DESCRIPTION),
		resolution: readText(value.Resolution, DEFAULT_RESOLUTION),
	};
};
