import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { triageConfig } from '../../config/triage.config';
import { isObviouslyNonMedical } from '../../utils/medicalScreening';
import {
    AnalysisResult,
    RetrievalResult,
    Severity,
    SymptomQuery,
    TriageResponse,
    TriageState,
} from '../../utils/types';
import { CareService } from '../care/care.service';
import { describeError } from '../gemini/gemini.service';
import { ReasoningService } from '../reasoning/reasoning.service';
import { buildGroundingContext } from '../retrieval/grounding';
import { RetrievalService } from '../retrieval/retrieval.service';
import { SessionStoreService } from '../session/session-store.service';
import { classify } from './triage-rules';

const PRESCREEN_ANALYSIS: AnalysisResult = Object.freeze({
    analysis: 'Non-medical input detected',
    severity: Severity.NON_MEDICAL,
    recommendation: 'Please describe your medical symptoms or health concerns for triage assistance.',
    success: true,
    usedFallback: false,
    severityDefaulted: false,
});

/**
 * Runs one query through
 * Received -> ContextLoaded -> Retrieved -> Analyzed -> Routed -> Completed.
 * Any exception moves the request to Errored; adapter failures never get
 * this far because the collaborators recover them.
 */
@Injectable()
export class TriageService {
    private readonly logger = new Logger(TriageService.name);

    constructor(
        private readonly sessions: SessionStoreService,
        private readonly retrieval: RetrievalService,
        private readonly reasoning: ReasoningService,
        private readonly care: CareService,
        @Inject(triageConfig.KEY) private readonly config: ConfigType<typeof triageConfig>,
    ) { }

    async triage(query: SymptomQuery): Promise<TriageResponse> {
        const tag = `[${query.sessionId}]`;
        const states: TriageState[] = [TriageState.Received];
        let retrieval: RetrievalResult | null = null;

        try {
            const conversationSummary = this.sessions.summarize(query.sessionId);
            states.push(TriageState.ContextLoaded);

            if (isObviouslyNonMedical(query.text)) {
                this.logger.log(`${tag} non-medical input, skipping retrieval and reasoning`);
                return this.route(query, PRESCREEN_ANALYSIS, null, states);
            }

            retrieval = await this.retrieval.retrieve(query);
            states.push(TriageState.Retrieved);
            this.logger.debug(`${tag} retrieval: ${retrieval.chunks.length} chunks (${retrieval.provenance})`);

            const analysis = await this.reasoning.analyze(query.sessionId, query.text, buildGroundingContext(retrieval.chunks), {
                conversationSummary: conversationSummary || undefined,
                patient: query.patient,
            });
            if (!analysis.success) {
                throw new Error(analysis.errorMessage ?? 'analysis failed');
            }
            states.push(TriageState.Analyzed);

            return this.route(query, analysis, retrieval, states);
        } catch (error) {
            states.push(TriageState.Errored);
            this.logger.error(`${tag} triage failed after ${states[states.length - 2]}: ${describeError(error)}`);
            return this.unavailable(query, retrieval, states);
        }
    }

    history(sessionId: string) {
        return this.sessions.history(sessionId);
    }

    private route(query: SymptomQuery, analysis: AnalysisResult, retrieval: RetrievalResult | null, states: TriageState[]): TriageResponse {
        const { kind, reason } = classify(analysis);
        states.push(TriageState.Routed);
        this.logger.log(`[${query.sessionId}] routed to ${kind} (${reason})`);

        const message = this.care.respond(kind, { sessionId: query.sessionId, symptoms: query.text, analysis });
        this.sessions.record(query.sessionId, query.text, message.reply);
        states.push(TriageState.Completed);

        return Object.freeze({
            sessionId: query.sessionId,
            originalText: query.text,
            decision: Object.freeze({ kind, analysis }),
            reply: message.reply,
            disclaimer: message.disclaimer,
            success: true,
            retrieval,
            states: Object.freeze([...states]),
        });
    }

    private unavailable(query: SymptomQuery, retrieval: RetrievalResult | null, states: TriageState[]): TriageResponse {
        const n = this.config.emergencyNumber;
        return Object.freeze({
            sessionId: query.sessionId,
            originalText: query.text,
            decision: null,
            reply: "I'm experiencing technical difficulties and the triage system is temporarily unavailable. " +
                `If this is a medical emergency, please call emergency services immediately (${n}).\n\n` +
                'Please try again in a moment, or contact a healthcare professional directly.',
            disclaimer: 'System temporarily unavailable. For emergencies, call emergency services.',
            success: false,
            retrieval,
            states: Object.freeze([...states]),
        });
    }
}
