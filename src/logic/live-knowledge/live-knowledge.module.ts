import { Module } from '@nestjs/common';
import { LiveKnowledgeService } from './live-knowledge.service';
import { LIVE_KNOWLEDGE_SOURCE } from './live-knowledge.types';

@Module({
    providers: [LiveKnowledgeService, { provide: LIVE_KNOWLEDGE_SOURCE, useExisting: LiveKnowledgeService }],
    exports: [LIVE_KNOWLEDGE_SOURCE],
})
export class LiveKnowledgeModule {}
