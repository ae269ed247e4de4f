import { Injectable } from '@nestjs/common';
import { CareKind } from '../../utils/types';
import { CareMessage, CareRequest, CareResponder, GENERAL_DISCLAIMER } from './care.types';

@Injectable()
export class SelfCareService implements CareResponder {
    readonly kind = CareKind.SelfCare;

    respond({ symptoms, analysis }: CareRequest): CareMessage {
        const reply = [
            'SELF-CARE RECOMMENDATIONS',
            `Symptoms: ${symptoms}`,
            `Severity: ${analysis.severity}`,
            '',
            'HOME CARE GUIDELINES:',
            '- Get plenty of rest and sleep',
            '- Stay well hydrated',
            '- Consider over-the-counter remedies as appropriate',
            '- Monitor your symptoms for changes',
            '',
            `Analysis: ${analysis.analysis}`,
            `Recommendation: ${analysis.recommendation}`,
            '',
            'SEEK MEDICAL CARE IF:',
            '- Symptoms get worse or do not improve within 3-5 days',
            '- New concerning symptoms develop',
            '- Your temperature rises above 39.4°C (103°F)',
            '- You feel unsure about your condition',
        ].join('\n');

        return { reply, disclaimer: GENERAL_DISCLAIMER };
    }
}
