export const EMBEDDINGS_CLIENT = Symbol('EMBEDDINGS_CLIENT');

export interface EmbeddingsClient {
    readonly name: string;
    readonly dimensions: number;
    embed(text: string): Promise<number[]>;
}
