export enum Severity {
    HIGH = 'HIGH',
    MODERATE = 'MODERATE',
    LOW = 'LOW',
    NON_MEDICAL = 'NON_MEDICAL',
}

export enum CareKind {
    Emergency = 'Emergency',
    SelfCare = 'SelfCare',
    Appointment = 'Appointment',
    NonMedical = 'NonMedical',
}

export enum KnowledgeCategory {
    EMERGENCY = 'emergency-indicator',
    SELF_CARE = 'self-care-indicator',
    APPOINTMENT = 'appointment-indicator',
}

export type Provenance = 'local' | 'live' | 'mixed';

export enum TriageState {
    Received = 'Received',
    ContextLoaded = 'ContextLoaded',
    Retrieved = 'Retrieved',
    Analyzed = 'Analyzed',
    Routed = 'Routed',
    Completed = 'Completed',
    Errored = 'Errored',
}

export interface PatientContext {
    age?: number;
    sex?: string;
    painScale?: number;
    medications?: string[];
    conditions?: string[];
    allergies?: string[];
    durationText?: string;
}

export interface SymptomQuery {
    readonly sessionId: string;
    readonly text: string;
    readonly patient?: Readonly<PatientContext>;
    readonly createdAt: number;
}

export interface ConversationTurn {
    readonly userInput: string;
    readonly systemReply: string;
    readonly ts: number;
}

export interface KnowledgeChunk {
    readonly id: string;
    readonly text: string;
    readonly sourceName: string;
    readonly sourceUrl: string;
    readonly category: KnowledgeCategory;
    readonly tags: readonly string[];
    /** Cosine-like relevance; nominally in [0,1] but may dip below 0. */
    readonly score: number;
}

export interface RetrievalResult {
    readonly chunks: readonly KnowledgeChunk[];
    readonly provenance: Provenance;
    readonly success: boolean;
}

export interface AnalysisSections {
    assessment: string;
    differential: string;
    riskLevel: string;
    correlation: string;
    recommendation: string;
}

export interface AnalysisResult {
    readonly analysis: string;
    readonly severity: Severity;
    readonly recommendation: string;
    readonly success: boolean;
    readonly errorMessage?: string;
    readonly usedFallback: boolean;
    /** True when the reply carried no usable risk level and MODERATE was assumed. */
    readonly severityDefaulted: boolean;
    readonly sections?: Readonly<AnalysisSections>;
}

export interface CareDecision {
    readonly kind: CareKind;
    readonly analysis: AnalysisResult;
}

export interface TriageResponse {
    readonly sessionId: string;
    readonly originalText: string;
    readonly decision: CareDecision | null;
    readonly reply: string;
    readonly disclaimer: string;
    readonly success: boolean;
    readonly retrieval: RetrievalResult | null;
    readonly states: readonly TriageState[];
}

export interface SourceRef {
    name: string;
    url: string;
    score: number;
}

export interface ChatResponse {
    sessionId: string;
    reply: string;
    route: CareKind | 'Error';
    emergency: boolean;
    sources: SourceRef[];
    disclaimer: string;
}

export function createSymptomQuery(sessionId: string, text: string, patient?: PatientContext): SymptomQuery {
    return Object.freeze({
        sessionId,
        text,
        patient: patient ? Object.freeze({ ...patient }) : undefined,
        createdAt: Date.now(),
    });
}
