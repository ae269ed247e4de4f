import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { triageConfig } from '../../config/triage.config';
import { truncate } from '../../utils/textNormalizer';
import { ConversationTurn } from '../../utils/types';

/**
 * Bounded per-session conversation history, kept for the process lifetime.
 *
 * Every method is synchronous, so a read-then-append on one session can
 * never interleave with another request's write to the same session.
 */
@Injectable()
export class SessionStoreService {
    private readonly logger = new Logger(SessionStoreService.name);
    private readonly sessions = new Map<string, ConversationTurn[]>();

    constructor(@Inject(triageConfig.KEY) private readonly config: ConfigType<typeof triageConfig>) { }

    record(sessionId: string, userText: string, systemText: string, ts = Date.now()): void {
        const turns = this.sessions.get(sessionId) ?? [];
        turns.push(Object.freeze({ userInput: userText, systemReply: systemText, ts }));
        if (turns.length > this.config.sessionHistoryCap) {
            turns.splice(0, turns.length - this.config.sessionHistoryCap);
        }
        this.sessions.set(sessionId, turns);
        this.logger.debug(`[${sessionId}] recorded turn (${turns.length}/${this.config.sessionHistoryCap})`);
    }

    history(sessionId: string): readonly ConversationTurn[] {
        return Object.freeze([...(this.sessions.get(sessionId) ?? [])]);
    }

    summarize(sessionId: string): string {
        return this.history(sessionId)
            .map(turn => `[${formatClock(turn.ts)}] Input: ${turn.userInput} | Response: ${truncate(turn.systemReply, 100)}`)
            .join('\n');
    }

    sessionCount(): number {
        return this.sessions.size;
    }
}

function formatClock(ts: number): string {
    const d = new Date(ts);
    return [d.getHours(), d.getMinutes(), d.getSeconds()].map(n => String(n).padStart(2, '0')).join(':');
}
