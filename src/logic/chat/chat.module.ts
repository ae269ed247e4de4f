import { Module } from '@nestjs/common';
import { TriageModule } from '../triage/triage.module';
import { ChatController } from './chat.controller';

@Module({
    imports: [TriageModule],
    controllers: [ChatController],
})
export class ChatModule {}
