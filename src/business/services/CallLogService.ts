// src/business/services/CallLogService.ts
import { inject, injectable } from "tsyringe";
import { ICallLogRepository } from "../../data/interfaces/ICallLogRepository";
import { ILeadLogRepository } from "../../data/interfaces/ILeadLogRepository";
import type { ConversationTurn } from "../models/ConversationTurnModel";
import { ResourceNotFoundError } from "../errors/ResourceNotFoundError";

@injectable()
export class CallLogService {
    constructor(
        @inject("ICallLogRepository") private readonly callLogRepository: ICallLogRepository,
        @inject("ILeadLogRepository") private readonly leadLogRepository: ILeadLogRepository
    ) {}

    public async initCall(sessionId: string): Promise<void> {
        await this.callLogRepository.initCall(sessionId, new Date());
    }

    public async recordTurn(
        sessionId: string,
        turn: ConversationTurn,
        escalated: boolean,
        phone?: string | null
    ): Promise<void> {
        try {
            await this.callLogRepository.appendTurn(sessionId, turn, escalated, phone);
        } catch (error) {
            console.error(`[CallLogService] Failed to record turn for ${sessionId}:`, error);
        }
    }

    public async endCall(sessionId: string): Promise<void> {
        const found = await this.callLogRepository.endCall(sessionId, new Date());
        if (!found) {
            throw new ResourceNotFoundError("Call not found for the specified session.");
        }
    }

    /** Most recent `limit` turns, oldest first; [] when nothing can be read. */
    public async getRecentTurns(sessionId: string, limit: number): Promise<ConversationTurn[]> {
        if (limit <= 0) return [];
        try {
            const record = await this.callLogRepository.getCall(sessionId);
            return record ? record.turns.slice(-limit) : [];
        } catch (error) {
            console.error(`[CallLogService] Failed to read history for ${sessionId}:`, error);
            return [];
        }
    }

    public async getLastUserQuery(sessionId: string): Promise<string | null> {
        const [last] = await this.getRecentTurns(sessionId, 1);
        return last ? last.user : null;
    }

    public async logLead(sessionId: string, phone: string, unansweredQuery: string): Promise<void> {
        try {
            await this.leadLogRepository.appendLead({ sessionId, phone, unansweredQuery, loggedAt: new Date() });
            console.log(`[CallLogService] Lead logged for ${sessionId}`);
        } catch (error) {
            console.error(`[CallLogService] Failed to log lead for ${sessionId}:`, error);
        }
    }
}
