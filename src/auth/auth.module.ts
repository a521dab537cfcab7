import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { AuthController } from './auth.controller';
import { AuthService } from './auth.service';
import { AccessGuard } from './guards/access.guard';
import { SessionsModule } from '../sessions/sessions.module';

@Module({
	imports: [SessionsModule],
	controllers: [AuthController],
	providers: [
		AuthService,
		{
			provide: APP_GUARD,
			useClass: AccessGuard,
		},
	],
	exports: [AuthService],
})
export class AuthModule {}
