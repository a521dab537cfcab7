import { Module } from '@nestjs/common';
import { AiModule } from '../ai/ai.module';
import { SessionsService } from './sessions.service';

@Module({
	imports: [AiModule],
	providers: [SessionsService],
	exports: [SessionsService],
})
export class SessionsModule { }
