import { Module } from '@nestjs/common';
import { KnowledgeIndexModule } from '../knowledge-index/knowledge-index.module';
import { LiveKnowledgeModule } from '../live-knowledge/live-knowledge.module';
import { RetrievalService } from './retrieval.service';

@Module({
    imports: [KnowledgeIndexModule, LiveKnowledgeModule],
    providers: [RetrievalService],
    exports: [RetrievalService],
})
export class RetrievalModule {}
