import { AnalyzerSession } from './analyzer-session';

describe('AnalyzerSession', () => {
	const extraction = { digest: 'd1', spec: { kind: 'structured' as const, value: { BrandName: 'Acme' } }, rawText: '{"BrandName":"Acme"}' };

	it('needs an extraction until one is cached for the digest', () => {
		const session = new AnalyzerSession('s1', 'prompt');

		expect(session.needsExtraction('d1')).toBe(true);
		session.replaceExtraction(extraction);
		expect(session.needsExtraction('d1')).toBe(false);
		expect(session.needsExtraction('d2')).toBe(true);
	});

	it('clears the spec together with its digest', () => {
		const session = new AnalyzerSession('s1', 'prompt');
		session.replaceExtraction(extraction);

		session.clearExtraction();

		expect(session.cachedExtraction).toBeNull();
		expect(session.extractedSpec).toBeNull();
		expect(session.needsExtraction('d1')).toBe(true);
	});
});
