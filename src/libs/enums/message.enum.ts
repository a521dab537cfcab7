export enum AuthMessage {
	ACCESS_GRANTED = 'Access granted',
	INVALID_TOKEN = 'Invalid token. Please try again.',
	ACCESS_NOT_CONFIGURED = 'Access token is not configured on the server',
	SESSION_REQUIRED = 'A valid session is required. Log in with the access token first.',
	LOGGED_OUT = 'Session closed',
}

export enum FileMessage {
	IMAGE_REQUIRED = 'Please upload an image for QA check before submitting.',
	IMAGE_UNREADABLE = 'Unable to read image: the uploaded file is empty',
	IMAGE_TYPE_INVALID = 'Image must be a JPEG, PNG or WebP file',
	DOCUMENT_TYPE_INVALID = 'Brand standards document must be a PDF file',
	DOCUMENT_UNREADABLE = 'Unable to read the brand standards document for hashing: the uploaded file is empty',
}

export enum AIMessage {
	API_KEY_MISSING = 'GEMINI_API_KEY not set in environment.',
	EMPTY_RESPONSE = 'Gemini returned an empty response',
	EXTRACTION_COMPLETE = 'Brand standards extraction complete.',
	EXTRACTION_REUSED = 'Using previously extracted brand standards (no change detected).',
	EXTRACTION_FAILED = 'Brand standards extraction failed',
	ANALYSIS_FAILED = 'Image analysis failed',
}

export enum ValidationMessage {
	FIELD_REQUIRED = 'This field is required',
	FIELD_INVALID = 'This field is invalid',
}
