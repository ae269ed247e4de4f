import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { KnowledgeChunkEntity } from '../../entities';
import { EmbeddingsModule } from '../embeddings/embeddings.module';
import { KnowledgeIndexService } from './knowledge-index.service';
import { KNOWLEDGE_INDEX } from './knowledge-index.types';

@Module({
    imports: [EmbeddingsModule, TypeOrmModule.forFeature([KnowledgeChunkEntity])],
    providers: [KnowledgeIndexService, { provide: KNOWLEDGE_INDEX, useExisting: KnowledgeIndexService }],
    exports: [KNOWLEDGE_INDEX, EmbeddingsModule],
})
export class KnowledgeIndexModule {}
