import { ExtractionStatus, NoticeLevel, QaCategory } from '../../enums';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type JsonStructure = JsonObject | JsonValue[];

/**
 * Best-effort reading of a model response.
 * `raw` keeps the original response text untouched.
 */
export type NormalizedResponse =
	| { kind: 'structured'; value: JsonStructure }
	| { kind: 'raw'; text: string };

export type ExtractedSpec = NormalizedResponse;

export type CachedExtraction = {
	digest: string;
	spec: ExtractedSpec;
	rawText: string;
};

export type QaVerdict =
	| {
		kind: 'structured';
		issuePresent: boolean;
		category: QaCategory;
		description: string;
		resolution: string;
	}
	| { kind: 'unparsed'; text: string };

export type UploadedBinary = {
	buffer: Buffer;
	mimeType?: string;
	originalName?: string;
};

export type SubmitInput = {
	image?: UploadedBinary;
	document?: UploadedBinary;
};

export type Notice = {
	level: NoticeLevel;
	message: string;
};

export type QaResultView =
	| {
		treatment: 'no-issue' | 'issue-present';
		tone: 'success' | 'error';
		category: QaCategory;
		description: string;
		resolution: string;
	}
	| {
		treatment: 'unparsed';
		tone: 'warning';
		heading: string;
		rawText: string;
	};

export type ExtractedSpecView =
	| { format: 'json'; data: JsonStructure }
	| { format: 'text'; text: string };

export type SubmitOutcome = {
	success: boolean;
	notices: Notice[];
	extraction: {
		status: ExtractionStatus;
		view?: ExtractedSpecView;
	};
	result: QaResultView | null;
};
