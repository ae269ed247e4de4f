import { Module } from '@nestjs/common';
import { AppointmentCareService } from './appointment-care.service';
import { CareService } from './care.service';
import { EmergencyCareService } from './emergency-care.service';
import { NonMedicalCareService } from './non-medical-care.service';
import { SelfCareService } from './self-care.service';

@Module({
    providers: [EmergencyCareService, SelfCareService, AppointmentCareService, NonMedicalCareService, CareService],
    exports: [CareService],
})
export class CareModule {}
