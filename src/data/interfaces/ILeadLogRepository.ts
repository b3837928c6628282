// src/data/interfaces/ILeadLogRepository.ts
export type LeadEntry = {
    sessionId: string;
    phone: string;
    unansweredQuery: string;
    loggedAt: Date;
};

export interface ILeadLogRepository {
    appendLead(entry: LeadEntry): Promise<void>;
}
