// src/data/repositories/CallLogRepository.ts
import fs from "fs/promises";
import path from "path";
import { inject, injectable } from "tsyringe";
import { z } from "zod";
import type { Config } from "../../config/config";
import type { ConversationTurn } from "../../business/models/ConversationTurnModel";
import { CallRecord, ICallLogRepository } from "../interfaces/ICallLogRepository";

const CALL_RECORDS_FILE = "call_records.json";

const callRecordSchema = z.object({
    startTime: z.string(),
    endTime: z.string().optional(),
    turns: z.array(z.object({ user: z.string(), agent: z.string() })).default([]),
    escalated: z.boolean().default(false),
    phone: z.string().nullable().default(null),
});
const callRecordsSchema = z.record(z.string(), callRecordSchema);

type CallRecords = Record<string, CallRecord>;

/**
 * All call records live in one JSON document keyed by session id. Every
 * mutation is a read-modify-write of that document, chained onto a single
 * promise so two turns of the same (or different) calls never overwrite
 * each other.
 */
@injectable()
export class CallLogRepository implements ICallLogRepository {
    private readonly filePath: string;
    private queue: Promise<unknown> = Promise.resolve();

    constructor(@inject("Config") config: Config) {
        this.filePath = path.join(config.logsDir, CALL_RECORDS_FILE);
    }

    public async initCall(sessionId: string, startedAt: Date): Promise<void> {
        await this.mutate((records) => {
            records[sessionId] = {
                startTime: startedAt.toISOString(),
                turns: [],
                escalated: false,
                phone: null,
            };
            return undefined;
        });
    }

    public async appendTurn(
        sessionId: string,
        turn: ConversationTurn,
        escalated: boolean,
        phone?: string | null
    ): Promise<void> {
        await this.mutate((records) => {
            const record = records[sessionId] ?? {
                startTime: new Date().toISOString(),
                turns: [],
                escalated: false,
                phone: null,
            };
            record.turns.push({ user: turn.user, agent: turn.agent });
            record.escalated = record.escalated || escalated;
            if (phone) record.phone = phone;
            records[sessionId] = record;
            return undefined;
        });
    }

    public async endCall(sessionId: string, endedAt: Date): Promise<boolean> {
        return this.mutate((records) => {
            const record = records[sessionId];
            if (!record) return false;
            record.endTime = endedAt.toISOString();
            return true;
        });
    }

    public async getCall(sessionId: string): Promise<CallRecord | null> {
        await this.queue;
        const records = await this.readAll();
        return records[sessionId] ?? null;
    }

    private mutate<T>(change: (records: CallRecords) => T): Promise<T> {
        const run = this.queue.then(async () => {
            const records = await this.readAll();
            const result = change(records);
            await this.writeAll(records);
            return result;
        });
        // A failed write must not block the ones queued behind it
        this.queue = run.catch((error: unknown) => {
            console.error("[CallLogRepository] Write failed:", error);
        });
        return run;
    }

    private async readAll(): Promise<CallRecords> {
        let raw: string;
        try {
            raw = await fs.readFile(this.filePath, "utf8");
        } catch (error) {
            if (isMissingFile(error)) return {};
            throw error;
        }
        if (!raw.trim()) return {};

        const parsed = callRecordsSchema.safeParse(JSON.parse(raw));
        if (!parsed.success) {
            throw new Error(`Malformed call records in ${this.filePath}: ${parsed.error.message}`);
        }
        return parsed.data;
    }

    private async writeAll(records: CallRecords): Promise<void> {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        const tmp = `${this.filePath}.tmp`;
        await fs.writeFile(tmp, JSON.stringify(records, null, 2), "utf8");
        await fs.rename(tmp, this.filePath);
    }
}

// fs errors may come from another realm, so match on shape rather than instanceof Error
const isMissingFile = (error: unknown): boolean =>
    typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
