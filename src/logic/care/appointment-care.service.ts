import { Injectable } from '@nestjs/common';
import { CareKind } from '../../utils/types';
import { CareMessage, CareRequest, CareResponder, GENERAL_DISCLAIMER } from './care.types';

@Injectable()
export class AppointmentCareService implements CareResponder {
    readonly kind = CareKind.Appointment;

    respond({ symptoms, analysis }: CareRequest): CareMessage {
        const reply = [
            'MEDICAL APPOINTMENT RECOMMENDED',
            `Symptoms: ${symptoms}`,
            `Severity: ${analysis.severity}`,
            '',
            'NEXT STEPS:',
            '- Contact your primary care physician',
            '- Book an appointment within 1-2 weeks, sooner if symptoms worsen',
            '- If you have no regular doctor, consider a walk-in clinic',
            '',
            'BEFORE THE APPOINTMENT:',
            '- Note when each symptom started and what makes it better or worse',
            '- Bring a list of your current medications',
            '',
            `Analysis: ${analysis.analysis}`,
            `Recommendation: ${analysis.recommendation}`,
            '',
            'GET URGENT HELP IF:',
            '- Symptoms suddenly get worse',
            '- You develop chest pain, difficulty breathing or confusion',
            '- You develop a fever above 38.3°C (101°F)',
        ].join('\n');

        return { reply, disclaimer: GENERAL_DISCLAIMER };
    }
}
