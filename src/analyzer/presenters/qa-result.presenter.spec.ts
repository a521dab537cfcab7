import { QaCategory } from '../../libs/enums';
import { interpretQaVerdict } from '../utils/interpret-qa-verdict.util';
import { normalizeModelResponse } from '../utils/normalize-model-response.util';
import { presentQaVerdict, UNPARSED_HEADING } from './qa-result.presenter';

const present = (text: string) => presentQaVerdict(interpretQaVerdict(normalizeModelResponse(text), text));

describe('presentQaVerdict', () => {
	it('uses the no-issue treatment when Issue_Present is false', () => {
		expect(present('{"Issue_Present": false, "Category": "Cleanliness", "Description": "x", "Resolution": "y"}')).toEqual({
			treatment: 'no-issue',
			tone: 'success',
			category: QaCategory.CLEANLINESS,
			description: 'x',
			resolution: 'y',
		});
	});

	it('uses the issue-present treatment when Issue_Present is true', () => {
		expect(present('{"Issue_Present": true, "Category": "Cleanliness", "Description": "x", "Resolution": "y"}')).toEqual({
			treatment: 'issue-present',
			tone: 'error',
			category: QaCategory.CLEANLINESS,
			description: 'x',
			resolution: 'y',
		});
	});

	it('shows raw text for unparsed verdicts', () => {
		expect(presentQaVerdict({ kind: 'unparsed', text: 'not json' })).toEqual({
			treatment: 'unparsed',
			tone: 'warning',
			heading: UNPARSED_HEADING,
			rawText: 'not json',
		});
	});
});
