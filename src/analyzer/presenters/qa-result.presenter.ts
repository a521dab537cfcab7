import { QaResultView, QaVerdict } from '../../libs/types/analyzer/analyzer.type';

export const UNPARSED_HEADING = 'Unable to Parse JSON';

export const presentQaVerdict = (verdict: QaVerdict): QaResultView => {
	if (verdict.kind === 'unparsed') {
		return {
			treatment: 'unparsed',
			tone: 'warning',
			heading: UNPARSED_HEADING,
			rawText: verdict.text,
		};
	}

	// The visual state depends on nothing but issuePresent
	return {
		treatment: verdict.issuePresent ? 'issue-present' : 'no-issue',
		tone: verdict.issuePresent ? 'error' : 'success',
		category: verdict.category,
		description: verdict.description,
		resolution: verdict.resolution,
	};
};
