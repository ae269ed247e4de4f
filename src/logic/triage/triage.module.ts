import { Module } from '@nestjs/common';
import { CareModule } from '../care/care.module';
import { ReasoningModule } from '../reasoning/reasoning.module';
import { RetrievalModule } from '../retrieval/retrieval.module';
import { SessionModule } from '../session/session.module';
import { TriageService } from './triage.service';

@Module({
    imports: [SessionModule, RetrievalModule, ReasoningModule, CareModule],
    providers: [TriageService],
    exports: [TriageService],
})
export class TriageModule {}
