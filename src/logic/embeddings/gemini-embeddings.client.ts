import { GeminiService } from '../gemini/gemini.service';
import { EmbeddingsClient } from './embeddings.types';

export class GeminiEmbeddingsClient implements EmbeddingsClient {
    readonly name = 'GEMINI';
    // text-embedding-004
    readonly dimensions = 768;

    constructor(private readonly geminiService: GeminiService) {}

    async embed(text: string): Promise<number[]> {
        const [vector] = await this.geminiService.embedTexts([text]);
        return vector;
    }
}
