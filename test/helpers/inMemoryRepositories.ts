import type { ConversationTurn } from "../../src/business/models/ConversationTurnModel";
import { CallRecord, ICallLogRepository } from "../../src/data/interfaces/ICallLogRepository";
import { ILeadLogRepository, LeadEntry } from "../../src/data/interfaces/ILeadLogRepository";

export class InMemoryCallLogRepository implements ICallLogRepository {
    public readonly records = new Map<string, CallRecord>();

    async initCall(sessionId: string, startedAt: Date): Promise<void> {
        this.records.set(sessionId, { startTime: startedAt.toISOString(), turns: [], escalated: false, phone: null });
    }

    async appendTurn(sessionId: string, turn: ConversationTurn, escalated: boolean, phone?: string | null): Promise<void> {
        const record = this.records.get(sessionId) ?? {
            startTime: new Date().toISOString(),
            turns: [],
            escalated: false,
            phone: null,
        };
        record.turns.push(turn);
        record.escalated = record.escalated || escalated;
        if (phone) record.phone = phone;
        this.records.set(sessionId, record);
    }

    async endCall(sessionId: string, endedAt: Date): Promise<boolean> {
        const record = this.records.get(sessionId);
        if (!record) return false;
        record.endTime = endedAt.toISOString();
        return true;
    }

    async getCall(sessionId: string): Promise<CallRecord | null> {
        return this.records.get(sessionId) ?? null;
    }
}

export class InMemoryLeadLogRepository implements ILeadLogRepository {
    public readonly leads: LeadEntry[] = [];

    async appendLead(entry: LeadEntry): Promise<void> {
        this.leads.push(entry);
    }
}
