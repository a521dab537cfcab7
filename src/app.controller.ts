import { Controller, Get } from '@nestjs/common';
import { Public } from './common/decorators/public.decorator';
import { AppService, HealthStatus } from './app.service';

@Controller()
export class AppController {
	constructor(private readonly appService: AppService) {}

	@Public()
	@Get('health')
	getHealth(): HealthStatus {
		return this.appService.getHealth();
	}
}
