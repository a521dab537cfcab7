import { registerAs } from '@nestjs/config';
import { DEFAULT_ANALYSIS_MODEL } from '../libs/config';
import { ExtractionPromptVariant } from '../libs/enums';

const toPromptVariant = (value?: string): ExtractionPromptVariant =>
	value?.trim().toLowerCase() === ExtractionPromptVariant.BASIC
		? ExtractionPromptVariant.BASIC
		: ExtractionPromptVariant.EXTENDED;

export default registerAs('gemini', () => ({
	apiKey: process.env.GEMINI_API_KEY || null,
	model: process.env.GEMINI_MODEL || DEFAULT_ANALYSIS_MODEL,
	extractionPromptVariant: toPromptVariant(process.env.EXTRACTION_PROMPT_VARIANT),
}));
