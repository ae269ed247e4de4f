import { Injectable, Logger } from '@nestjs/common';
import { CareKind } from '../../utils/types';
import { AppointmentCareService } from './appointment-care.service';
import { CareMessage, CareRequest, CareResponder } from './care.types';
import { EmergencyCareService } from './emergency-care.service';
import { NonMedicalCareService } from './non-medical-care.service';
import { SelfCareService } from './self-care.service';

@Injectable()
export class CareService {
    private readonly logger = new Logger(CareService.name);
    private readonly responders: ReadonlyMap<CareKind, CareResponder>;

    constructor(
        emergency: EmergencyCareService,
        selfCare: SelfCareService,
        appointment: AppointmentCareService,
        nonMedical: NonMedicalCareService,
    ) {
        this.responders = new Map<CareKind, CareResponder>(
            [emergency, selfCare, appointment, nonMedical].map((r): [CareKind, CareResponder] => [r.kind, r]),
        );
    }

    respond(kind: CareKind, request: CareRequest): CareMessage {
        const responder = this.responders.get(kind);
        if (!responder) {
            throw new Error(`No care responder registered for ${kind}`);
        }
        this.logger.log(`[${request.sessionId}] ${kind} response`);
        return responder.respond(request);
    }
}
