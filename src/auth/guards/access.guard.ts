import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { IS_PUBLIC_KEY } from '../../common/decorators/public.decorator';
import { SessionRequest } from '../../common/interfaces/session-request.interface';
import { SESSION_HEADER } from '../../libs/config';
import { AuthMessage } from '../../libs/enums';
import { SessionsService } from '../../sessions/sessions.service';

/**
 * Gates every non-public route on a live session id header.
 */
@Injectable()
export class AccessGuard implements CanActivate {
	constructor(
		private readonly reflector: Reflector,
		private readonly sessionsService: SessionsService,
	) { }

	canActivate(context: ExecutionContext): boolean {
		const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
			context.getHandler(),
			context.getClass(),
		]);
		if (isPublic) {
			return true;
		}

		const request = context.switchToHttp().getRequest<SessionRequest>();
		const header = request.headers[SESSION_HEADER];
		const sessionId = Array.isArray(header) ? header[0] : header;
		const session = sessionId ? this.sessionsService.find(sessionId) : null;

		if (!session) {
			throw new UnauthorizedException(AuthMessage.SESSION_REQUIRED);
		}

		request.analyzerSession = session;
		return true;
	}
}
