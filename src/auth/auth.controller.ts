import { Controller, Post, Body, HttpCode, HttpStatus } from '@nestjs/common';
import { AuthService } from './auth.service';
import { LoginDto, AuthResponseDto } from '../libs/dto';
import { Public } from '../common/decorators/public.decorator';
import { CurrentSession } from '../common/decorators/current-session.decorator';
import { AnalyzerSession } from '../sessions/analyzer-session';

@Controller('auth')
export class AuthController {
	constructor(private readonly authService: AuthService) {}

	@Public()
	@Post('login')
	@HttpCode(HttpStatus.OK)
	login(@Body() loginDto: LoginDto): AuthResponseDto {
		return this.authService.login(loginDto);
	}

	@Post('logout')
	@HttpCode(HttpStatus.OK)
	logout(@CurrentSession() session: AnalyzerSession): { message: string } {
		return this.authService.logout(session.id);
	}
}
