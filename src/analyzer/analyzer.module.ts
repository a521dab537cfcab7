import { Module } from '@nestjs/common';
import { AiModule } from '../ai/ai.module';
import { AnalyzerController } from './analyzer.controller';
import { AnalyzerService } from './analyzer.service';
import { DocumentExtractorService } from './document-extractor.service';
import { ImageAuditorService } from './image-auditor.service';

@Module({
	imports: [AiModule],
	controllers: [AnalyzerController],
	providers: [AnalyzerService, DocumentExtractorService, ImageAuditorService],
	exports: [AnalyzerService],
})
export class AnalyzerModule { }
