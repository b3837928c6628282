// src/data/interfaces/ICallLogRepository.ts
import type { ConversationTurn } from "../../business/models/ConversationTurnModel";

export type CallRecord = {
    startTime: string;
    endTime?: string;
    turns: ConversationTurn[];
    escalated: boolean;
    phone: string | null;
};

export interface ICallLogRepository {
    initCall(sessionId: string, startedAt: Date): Promise<void>;

    /** Appends one turn; `escalated` only ever flips from false to true. */
    appendTurn(
        sessionId: string,
        turn: ConversationTurn,
        escalated: boolean,
        phone?: string | null
    ): Promise<void>;

    /** Returns false when the session has no record. */
    endCall(sessionId: string, endedAt: Date): Promise<boolean>;

    getCall(sessionId: string): Promise<CallRecord | null>;
}
