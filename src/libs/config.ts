// Multimodal model used for both document extraction and image QA
export const DEFAULT_ANALYSIS_MODEL = 'gemini-2.5-flash';

export const DEFAULT_IMAGE_MIME_TYPE = 'image/jpeg';
export const DEFAULT_DOCUMENT_MIME_TYPE = 'application/pdf';

// Multer reports this when the client did not declare a type
export const GENERIC_BINARY_MIME_TYPE = 'application/octet-stream';

export const IMAGE_MIME_TYPES = ['image/jpeg', 'image/png', 'image/webp'] as const;
export const DOCUMENT_MIME_TYPES = ['application/pdf'] as const;

export const FILE_SIZE_LIMIT = { fileSize: 30 * 1024 * 1024 }; // 30MB

export const ANALYZER_UPLOAD_FIELDS = [
	{ name: 'image', maxCount: 1 },
	{ name: 'document', maxCount: 1 },
];

export const SESSION_HEADER = 'x-session-id';
