import { AnalysisResult, CareKind } from '../../utils/types';

export interface CareRequest {
    sessionId: string;
    symptoms: string;
    analysis: AnalysisResult;
}

export interface CareMessage {
    reply: string;
    disclaimer: string;
}

/** Template-only renderer for one triage outcome. */
export interface CareResponder {
    readonly kind: CareKind;
    respond(request: CareRequest): CareMessage;
}

export const GENERAL_DISCLAIMER = 'This is an automated triage aid, not a diagnosis. Always consult real medical professionals for health concerns.';
