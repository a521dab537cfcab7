import { JsonStructure, NormalizedResponse } from '../../libs/types/analyzer/analyzer.type';

const FENCE = '```';
const JSON_FENCE = '```json';

/**
 * Content between `opener` and the next fence, or the remainder when the fence is never closed.
 */
const sliceFence = (text: string, opener: string): string => {
	const start = text.indexOf(opener) + opener.length;
	const end = text.indexOf(FENCE, start);
	return (end === -1 ? text.slice(start) : text.slice(start, end)).trim();
};

/**
 * Strip markdown code fences from model output.
 * A fence tagged `json` wins over a generic one; text without fences is only trimmed.
 */
export const defenceModelText = (text: string): string => {
	const trimmed = text.trim();
	if (trimmed.includes(JSON_FENCE)) {
		return sliceFence(trimmed, JSON_FENCE);
	}
	if (trimmed.includes(FENCE)) {
		return sliceFence(trimmed, FENCE);
	}
	return trimmed;
};

// JSON.parse only ever yields JSON values, so any object here is a JSON object or array
const isJsonStructure = (value: unknown): value is JsonStructure => typeof value === 'object' && value !== null;

const parseJson = (text: string): { ok: true; value: unknown } | { ok: false } => {
	try {
		return { ok: true, value: JSON.parse(text) };
	} catch {
		return { ok: false };
	}
};

/**
 * Defence then strictly parse a model response.
 * Only objects and arrays count as structured; otherwise the original text comes back as `raw`.
 */
export const normalizeModelResponse = (text: string): NormalizedResponse => {
	const parsed = parseJson(defenceModelText(text));
	if (parsed.ok && isJsonStructure(parsed.value)) {
		return { kind: 'structured', value: parsed.value };
	}
	return { kind: 'raw', text };
};
