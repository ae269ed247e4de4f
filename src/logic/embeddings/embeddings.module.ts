import { Module } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { triageConfig, EmbedProvider } from '../../config/triage.config';
import { GeminiModule } from '../gemini/gemini.module';
import { GeminiService } from '../gemini/gemini.service';
import { EMBEDDINGS_CLIENT, EmbeddingsClient } from './embeddings.types';
import { GeminiEmbeddingsClient } from './gemini-embeddings.client';
import { HashingEmbeddingsClient } from './hashing-embeddings.client';

@Module({
    imports: [GeminiModule],
    providers: [
        {
            provide: EMBEDDINGS_CLIENT,
            inject: [triageConfig.KEY, GeminiService],
            useFactory: (config: ConfigType<typeof triageConfig>, gemini: GeminiService): EmbeddingsClient =>
                config.embedProvider === EmbedProvider.GEMINI
                    ? new GeminiEmbeddingsClient(gemini)
                    : new HashingEmbeddingsClient(),
        },
    ],
    exports: [EMBEDDINGS_CLIENT],
})
export class EmbeddingsModule {}
