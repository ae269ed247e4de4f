import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { GoogleGenAI } from '@google/genai';
import { triageConfig } from '../../config/triage.config';

export class GeminiUnavailableError extends Error {
    constructor(message = 'Gemini API key not configured') {
        super(message);
        this.name = 'GeminiUnavailableError';
    }
}

@Injectable()
export class GeminiService {
    private readonly logger = new Logger(GeminiService.name);
    private readonly genAI: GoogleGenAI | null;
    private readonly EMBED_MODEL: string;
    private readonly CHAT_MODEL: string;

    constructor(@Inject(triageConfig.KEY) config: ConfigType<typeof triageConfig>) {
        this.EMBED_MODEL = config.gemini.embedModel;
        this.CHAT_MODEL = config.gemini.chatModel;
        // One attempt per call: the SDK's timeout is the only bound, nothing retries.
        this.genAI = config.gemini.apiKey
            ? new GoogleGenAI({ apiKey: config.gemini.apiKey, httpOptions: { timeout: config.reasoningTimeoutMs } })
            : null;
        this.logger.log(`Gemini client ${this.genAI ? 'configured' : 'not configured (API key missing)'}`);
    }

    isConfigured(): boolean {
        return this.genAI !== null;
    }

    async embedTexts(texts: string[]): Promise<number[][]> {
        const client = this.requireClient();
        try {
            const result = await client.models.embedContent({ contents: texts, model: this.EMBED_MODEL });
            const embeddings = (result.embeddings ?? [])
                .map(item => item?.values)
                .filter((values): values is number[] => Array.isArray(values));
            if (embeddings.length !== texts.length) {
                throw new Error(`expected ${texts.length} embeddings, received ${embeddings.length}`);
            }
            return embeddings;
        } catch (error) {
            throw new Error(`Failed to generate embeddings: ${describeError(error)}`);
        }
    }

    /**
     * Single-turn completion. Gemini has no system role, so the system text
     * travels as a preamble in the first user turn.
     */
    async complete(system: string, user: string, temperature = 0.2): Promise<string> {
        const client = this.requireClient();
        const preamble = system.trim() ? `${system.trim()}\n\n` : '';
        try {
            const result = await client.models.generateContent({
                model: this.CHAT_MODEL,
                config: { temperature },
                contents: [
                    ...(preamble ? [{ role: 'user', parts: [{ text: preamble }] }] : []),
                    { role: 'user', parts: [{ text: user }] },
                ],
            });
            return result.text ?? '';
        } catch (error) {
            throw new Error(`Failed to generate content: ${describeError(error)}`);
        }
    }

    private requireClient(): GoogleGenAI {
        if (!this.genAI) {
            throw new GeminiUnavailableError();
        }
        return this.genAI;
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
