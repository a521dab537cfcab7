export type LlmContentPart =
	| { kind: 'bytes'; data: Buffer; mimeType: string }
	| { kind: 'text'; text: string };

export type LlmRequest = {
	systemInstruction: string;
	parts: LlmContentPart[];
};
