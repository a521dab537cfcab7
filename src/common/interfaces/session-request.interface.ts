import type { Request } from 'express';
import { AnalyzerSession } from '../../sessions/analyzer-session';

/**
 * Request after AccessGuard resolved the caller's session.
 */
export interface SessionRequest extends Request {
	analyzerSession?: AnalyzerSession;
}
