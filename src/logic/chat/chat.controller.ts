import { Body, Controller, Get, HttpCode, HttpException, HttpStatus, Logger, Post, Query } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { CareKind, ChatResponse, ConversationTurn, createSymptomQuery, TriageResponse } from '../../utils/types';
import { TriageService } from '../triage/triage.service';
import { ChatRequestDto, HistoryQueryDto } from './dto/chat.dto';

export function toChatResponse(response: TriageResponse): ChatResponse {
    const route = response.decision?.kind ?? 'Error';
    return {
        sessionId: response.sessionId,
        reply: response.reply,
        route,
        emergency: route === CareKind.Emergency,
        sources: (response.retrieval?.chunks ?? []).map(c => ({ name: c.sourceName, url: c.sourceUrl, score: c.score })),
        disclaimer: response.disclaimer,
    };
}

@Controller()
export class ChatController {
    private readonly logger = new Logger(ChatController.name);

    constructor(private readonly triageService: TriageService) {}

    @Post(['chat', 'api/triage'])
    @HttpCode(HttpStatus.OK)
    async chat(@Body() body: ChatRequestDto): Promise<ChatResponse> {
        const sessionId = body.sessionId || uuidv4().slice(0, 8);
        const response = await this.triageService.triage(createSymptomQuery(sessionId, body.text, body.patient));
        const payload = toChatResponse(response);

        if (!response.success) {
            this.logger.error(`[${sessionId}] responding with 500 after ${response.states.join(' -> ')}`);
            throw new HttpException(payload, HttpStatus.INTERNAL_SERVER_ERROR);
        }
        return payload;
    }

    @Get('chat/history')
    history(@Query() query: HistoryQueryDto): { sessionId: string; turns: readonly ConversationTurn[] } {
        return { sessionId: query.sessionId, turns: this.triageService.history(query.sessionId) };
    }
}
