export enum ExtractionPromptVariant {
	BASIC = 'basic',
	EXTENDED = 'extended',
}

export enum QaCategory {
	CONDITION = 'Condition',
	CLEANLINESS = 'Cleanliness',
	COMPLIANCE = 'Compliance',
	UNKNOWN = 'Unknown',
}

export enum ExtractionStatus {
	EXTRACTED = 'extracted',
	CACHED = 'cached',
	FAILED = 'failed',
	UNREADABLE = 'unreadable',
	NONE = 'none',
}

export enum NoticeLevel {
	SUCCESS = 'success',
	INFO = 'info',
	WARNING = 'warning',
	ERROR = 'error',
}
