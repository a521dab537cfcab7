import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { AuthMessage } from '../../libs/enums';
import { AnalyzerSession } from '../../sessions/analyzer-session';
import { SessionRequest } from '../interfaces/session-request.interface';

export const CurrentSession = createParamDecorator((_data: unknown, ctx: ExecutionContext): AnalyzerSession => {
	const request = ctx.switchToHttp().getRequest<SessionRequest>();
	if (!request.analyzerSession) {
		throw new UnauthorizedException(AuthMessage.SESSION_REQUIRED);
	}
	return request.analyzerSession;
});
