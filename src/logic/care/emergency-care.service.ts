import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { triageConfig } from '../../config/triage.config';
import { CareKind } from '../../utils/types';
import { CareMessage, CareRequest, CareResponder } from './care.types';

@Injectable()
export class EmergencyCareService implements CareResponder {
    readonly kind = CareKind.Emergency;

    constructor(@Inject(triageConfig.KEY) private readonly config: ConfigType<typeof triageConfig>) { }

    respond({ symptoms, analysis }: CareRequest): CareMessage {
        const n = this.config.emergencyNumber;
        const reply = [
            `Contact emergency services immediately (call ${n}) or go to the nearest emergency department.`,
            '',
            'EMERGENCY MEDICAL ATTENTION REQUIRED',
            `Based on your symptoms: ${symptoms}`,
            `Severity assessment: ${analysis.severity}`,
            '',
            'WHILE YOU WAIT FOR HELP:',
            '- Do not drive yourself; ask someone to call an ambulance if needed',
            '- If breathing is difficult, sit upright and loosen tight clothing',
            '- Stay calm and follow the dispatcher\'s instructions',
            '',
            'MEDICAL ANALYSIS:',
            analysis.analysis,
            '',
            `RECOMMENDATION: ${analysis.recommendation}`,
            '',
            'These symptoms may point to a serious condition such as a heart attack, stroke or pulmonary embolism. Do not delay seeking care.',
        ].join('\n');

        return {
            reply,
            disclaimer: `This is an automated triage aid, not a diagnosis. Call emergency services (${n}) immediately for urgent situations.`,
        };
    }
}
