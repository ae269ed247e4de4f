import { Module } from '@nestjs/common';
import { GeminiModule } from '../gemini/gemini.module';
import { ReasoningService } from './reasoning.service';

@Module({
    imports: [GeminiModule],
    providers: [ReasoningService],
    exports: [ReasoningService],
})
export class ReasoningModule {}
