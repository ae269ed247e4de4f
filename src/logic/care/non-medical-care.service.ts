import { Injectable } from '@nestjs/common';
import { CareKind } from '../../utils/types';
import { CareMessage, CareResponder } from './care.types';

@Injectable()
export class NonMedicalCareService implements CareResponder {
    readonly kind = CareKind.NonMedical;

    respond(): CareMessage {
        const reply = [
            "I'm a medical triage assistant designed to help with health symptoms and medical concerns.",
            '',
            'Please describe your symptoms, for example:',
            '- Pain, discomfort or unusual sensations',
            '- Changes in how you feel physically',
            '- Health concerns you are experiencing',
            '',
            "Examples: 'I have chest pain', 'headache for 3 days', 'fever and cough'",
        ].join('\n');

        return { reply, disclaimer: 'This system is designed for medical symptom assessment only.' };
    }
}
