import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHash, timingSafeEqual } from 'crypto';
import { AuthResponseDto, LoginDto } from '../libs/dto';
import { AuthMessage } from '../libs/enums';
import { SessionsService } from '../sessions/sessions.service';

@Injectable()
export class AuthService {
	private readonly logger = new Logger(AuthService.name);

	constructor(
		private readonly configService: ConfigService,
		private readonly sessionsService: SessionsService,
	) { }

	login(loginDto: LoginDto): AuthResponseDto {
		const accessToken = this.configService.get<string | null>('app.accessToken');
		if (!accessToken) {
			this.logger.error('❌ APP_PASSWORD is missing in environment variables');
			throw new UnauthorizedException(AuthMessage.ACCESS_NOT_CONFIGURED);
		}

		if (!this.matches(loginDto.token, accessToken)) {
			this.logger.warn('🔒 Rejected login with an invalid token');
			throw new UnauthorizedException(AuthMessage.INVALID_TOKEN);
		}

		const session = this.sessionsService.create();
		return {
			authenticated: true,
			session_id: session.id,
			message: AuthMessage.ACCESS_GRANTED,
		};
	}

	logout(sessionId: string): { message: string } {
		this.sessionsService.remove(sessionId);
		return { message: AuthMessage.LOGGED_OUT };
	}

	// Digests have equal length, which timingSafeEqual requires
	private matches(candidate: string, expected: string): boolean {
		const digest = (value: string) => createHash('sha256').update(value).digest();
		return timingSafeEqual(digest(candidate), digest(expected));
	}
}
