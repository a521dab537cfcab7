import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { PromptBuilderService } from '../ai/prompt-builder.service';
import { AnalyzerSession } from './analyzer-session';

/**
 * In-memory session registry. Sessions never expire and are never shared.
 */
@Injectable()
export class SessionsService {
	private readonly logger = new Logger(SessionsService.name);
	private readonly sessions = new Map<string, AnalyzerSession>();

	constructor(private readonly promptBuilder: PromptBuilderService) { }

	create(): AnalyzerSession {
		const session = new AnalyzerSession(randomUUID(), this.promptBuilder.getDefaultExtractionPrompt());
		this.sessions.set(session.id, session);
		this.logger.log(`🆕 Session opened: ${session.id} (${this.sessions.size} active)`);
		return session;
	}

	find(id: string): AnalyzerSession | null {
		return this.sessions.get(id) ?? null;
	}

	remove(id: string): boolean {
		const removed = this.sessions.delete(id);
		if (removed) {
			this.logger.log(`👋 Session closed: ${id}`);
		}
		return removed;
	}
}
