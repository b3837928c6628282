// src/data/repositories/LeadLogRepository.ts
import fs from "fs/promises";
import path from "path";
import { inject, injectable } from "tsyringe";
import type { Config } from "../../config/config";
import { ILeadLogRepository, LeadEntry } from "../interfaces/ILeadLogRepository";

const LEAD_LOG_FILE = "lead_logs.txt";

@injectable()
export class LeadLogRepository implements ILeadLogRepository {
    private readonly filePath: string;

    constructor(@inject("Config") config: Config) {
        this.filePath = path.join(config.logsDir, LEAD_LOG_FILE);
    }

    public static formatLine(entry: LeadEntry): string {
        const query = entry.unansweredQuery.replace(/\s+/g, " ").trim();
        return `${entry.loggedAt.toISOString()} | call_id=${entry.sessionId} | phone=${entry.phone} | unanswered_query=${query}\n`;
    }

    public async appendLead(entry: LeadEntry): Promise<void> {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        // appendFile writes a single line in one call, so concurrent leads do not interleave
        await fs.appendFile(this.filePath, LeadLogRepository.formatLine(entry), "utf8");
    }
}
