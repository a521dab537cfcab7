import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ExtractionPromptVariant } from '../libs/enums';
import { ExtractedSpec } from '../libs/types/analyzer/analyzer.type';
import { BRAND_EXTRACTION_PROMPTS } from './prompts/brand-extraction.prompt';
import { QA_AUDIT_CONTEXT_HEADING, QA_AUDIT_PROMPT } from './prompts/qa-audit.prompt';

// ═══════════════════════════════════════════════════════════
// PROMPT BUILDER
// Static prompt text lives in ./prompts; this service only assembles it.
// ═══════════════════════════════════════════════════════════

@Injectable()
export class PromptBuilderService {
    constructor(private readonly configService: ConfigService) { }

    /**
     * Extraction system prompt for new sessions, chosen by EXTRACTION_PROMPT_VARIANT.
     */
    getDefaultExtractionPrompt(): string {
        const variant =
            this.configService.get<ExtractionPromptVariant>('gemini.extractionPromptVariant') ??
            ExtractionPromptVariant.EXTENDED;
        return BRAND_EXTRACTION_PROMPTS[variant];
    }

    /**
     * QA rubric, followed by the extracted brand standards when there are any.
     */
    buildAuditInstruction(context: ExtractedSpec | null): string {
        const serialized = context ? this.serializeContext(context) : '';
        return serialized ? QA_AUDIT_PROMPT + QA_AUDIT_CONTEXT_HEADING + serialized : QA_AUDIT_PROMPT;
    }

    /**
     * Structured specs go in as JSON, raw ones verbatim.
     * Empty specs (no keys, no items, blank text) serialize to ''.
     */
    serializeContext(spec: ExtractedSpec): string {
        if (spec.kind === 'raw') {
            return spec.text.trim() ? spec.text : '';
        }
        const isEmpty = Array.isArray(spec.value) ? spec.value.length === 0 : Object.keys(spec.value).length === 0;
        return isEmpty ? '' : JSON.stringify(spec.value);
    }
}
