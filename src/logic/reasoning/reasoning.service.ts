import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { triageConfig } from '../../config/triage.config';
import { AnalysisResult, PatientContext } from '../../utils/types';
import { describeError, GeminiService } from '../gemini/gemini.service';
import { fallbackAnalysis } from './fallback-rules';
import { triageSystemPrompt, triageUserPrompt } from './prompts';
import { parseReply } from './reply-parser';

export interface AnalyzeOptions {
    conversationSummary?: string;
    patient?: PatientContext;
}

@Injectable()
export class ReasoningService {
    private readonly logger = new Logger(ReasoningService.name);

    constructor(
        private readonly geminiService: GeminiService,
        @Inject(triageConfig.KEY) private readonly config: ConfigType<typeof triageConfig>,
    ) { }

    /**
     * Never rejects and never reports failure because the reasoning service
     * is down: every transport or format problem lands on the fallback table.
     */
    async analyze(sessionId: string, symptoms: string, groundingContext: string, options: AnalyzeOptions = {}): Promise<AnalysisResult> {
        if (!this.geminiService.isConfigured()) {
            this.logger.warn(`[${sessionId}] reasoning service not configured, using fallback analysis`);
            return this.fallback(symptoms, 'reasoning service not configured');
        }

        let reply: string;
        try {
            reply = await this.geminiService.complete(
                triageSystemPrompt(),
                triageUserPrompt({ symptoms, groundingContext, ...options }),
            );
        } catch (error) {
            this.logger.warn(`[${sessionId}] reasoning call failed, using fallback analysis: ${describeError(error)}`);
            return this.fallback(symptoms, describeError(error));
        }

        if (!reply.trim()) {
            this.logger.warn(`[${sessionId}] empty reasoning reply, using fallback analysis`);
            return this.fallback(symptoms, 'empty reply');
        }

        const parsed = parseReply(reply);
        if (!parsed) {
            this.logger.warn(`[${sessionId}] reasoning reply had no recognizable sections, using fallback analysis`);
            return this.fallback(symptoms, 'unrecognized reply format');
        }

        if (parsed.severityDefaulted) {
            this.logger.debug(`[${sessionId}] no usable risk level in reply, assuming MODERATE`);
        }
        this.logger.log(`[${sessionId}] analysis complete: ${parsed.severity}`);
        return Object.freeze({
            analysis: parsed.analysis,
            severity: parsed.severity,
            recommendation: parsed.recommendation,
            success: true,
            usedFallback: false,
            severityDefaulted: parsed.severityDefaulted,
            sections: Object.freeze(parsed.sections),
        });
    }

    private fallback(symptoms: string, reason: string): AnalysisResult {
        const outcome = fallbackAnalysis(symptoms, this.config.emergencyNumber);
        return Object.freeze({
            analysis: outcome.analysis,
            severity: outcome.severity,
            recommendation: outcome.recommendation,
            success: true,
            errorMessage: reason,
            usedFallback: true,
            severityDefaulted: false,
        });
    }
}
