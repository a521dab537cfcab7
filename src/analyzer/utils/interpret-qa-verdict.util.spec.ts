import { QaCategory } from '../../libs/enums';
import { DEFAULT_DESCRIPTION, DEFAULT_RESOLUTION, interpretQaVerdict } from './interpret-qa-verdict.util';
import { normalizeModelResponse } from './normalize-model-response.util';

const interpret = (text: string) => interpretQaVerdict(normalizeModelResponse(text), text);

describe('interpretQaVerdict', () => {
	it('reads a well-formed verdict', () => {
		expect(
			interpret('{"Issue_Present": true, "Category": "Condition", "Description": "Chipped desk", "Resolution": "Repair"}'),
		).toEqual({
			kind: 'structured',
			issuePresent: true,
			category: QaCategory.CONDITION,
			description: 'Chipped desk',
			resolution: 'Repair',
		});
	});

	it('matches categories case-insensitively', () => {
		const verdict = interpret('{"Issue_Present": true, "Category": "cleanliness"}');
		expect(verdict).toMatchObject({ category: QaCategory.CLEANLINESS });
	});

	it('maps unknown categories to Unknown', () => {
		expect(interpret('{"Issue_Present": true, "Category": "Lighting"}')).toMatchObject({ category: QaCategory.UNKNOWN });
	});

	it('fills defaults for missing fields', () => {
		expect(interpret('{}')).toEqual({
			kind: 'structured',
			issuePresent: false,
			category: QaCategory.UNKNOWN,
			description: DEFAULT_DESCRIPTION,
			resolution: DEFAULT_RESOLUTION,
		});
	});

	it.each([
		['"false"', false],
		['"TRUE"', true],
		['null', false],
		['1', true],
	])('reads Issue_Present %s as %s', (raw, expected) => {
		expect(interpret(`{"Issue_Present": ${raw}}`)).toMatchObject({ issuePresent: expected });
	});

	it('accepts the IssuePresent spelling', () => {
		expect(interpret('{"IssuePresent": true}')).toMatchObject({ issuePresent: true });
	});

	it('keeps the original text for non-JSON answers', () => {
		expect(interpret('The room looks fine.')).toEqual({ kind: 'unparsed', text: 'The room looks fine.' });
	});

	it('keeps the original text for JSON lists', () => {
		const text = '```json\n[{"Category": "Condition"}]\n```';
		expect(interpret(text)).toEqual({ kind: 'unparsed', text });
	});
});
