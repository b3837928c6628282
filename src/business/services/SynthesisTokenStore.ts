// src/business/services/SynthesisTokenStore.ts
import crypto from "crypto";
import { inject, injectable } from "tsyringe";
import type { Config } from "../../config/config";
import type { SynthesisOutcome } from "../models/SynthesisModel";

export type TokenState = "pending" | "generating" | "cached" | "unknown";

type PendingEntry = { text: string; createdAt: number };
type CachedAudio = { audio: Buffer; expiresAt: number };

/**
 * Process-wide handoff between reply generation and audio fetches.
 *
 * pending -> consumed                      (streaming clients)
 * pending -> generating -> cached -> gone  (buffering clients)
 *
 * Every read-modify-write below runs synchronously, so on the single event
 * loop no two requests can interleave inside one of them.
 */
@injectable()
export class SynthesisTokenStore {
    private readonly pending = new Map<string, PendingEntry>();
    private readonly cache = new Map<string, CachedAudio>();
    private readonly generating = new Map<string, Promise<SynthesisOutcome>>();
    private sweeper: NodeJS.Timeout | null = null;

    constructor(@inject("Config") private readonly config: Config) {}

    public create(text: string): string {
        const token = crypto.randomUUID();
        this.pending.set(token, { text, createdAt: Date.now() });
        return token;
    }

    /** Atomic pop: the first caller gets the text, every later caller gets null. */
    public consume(token: string): string | null {
        const entry = this.pending.get(token);
        if (!entry) return null;
        this.pending.delete(token);
        return entry.text;
    }

    public state(token: string): TokenState {
        if (this.getCached(token)) return "cached";
        if (this.generating.has(token)) return "generating";
        if (this.pending.has(token)) return "pending";
        return "unknown";
    }

    public getCached(token: string): Buffer | null {
        const entry = this.cache.get(token);
        if (!entry) return null;
        if (entry.expiresAt <= Date.now()) {
            this.cache.delete(token);
            return null;
        }
        return entry.audio;
    }

    public getGenerating(token: string): Promise<SynthesisOutcome> | undefined {
        return this.generating.get(token);
    }

    /**
     * Consume a pending token and run `produce` on its text, publishing the
     * in-flight work so duplicate fetches can wait on it. Audio is cached when
     * the work succeeds, even if the fetch that started it has already given
     * up. Returns null when the token is not pending.
     */
    public beginGeneration(
        token: string,
        produce: (text: string) => Promise<SynthesisOutcome>
    ): Promise<SynthesisOutcome> | null {
        const text = this.consume(token);
        if (text === null) return null;

        const work = Promise.resolve()
            .then(() => produce(text))
            .then((outcome) => {
                if (outcome.kind === "audio") {
                    this.cache.set(token, { audio: outcome.audio, expiresAt: Date.now() + this.config.audioCacheTtlMs });
                }
                return outcome;
            })
            .finally(() => {
                this.generating.delete(token);
            });

        this.generating.set(token, work);
        return work;
    }

    /** Drops expired audio and pending tokens nobody fetched in time. */
    public sweep(): { pending: number; cached: number } {
        const now = Date.now();
        let cached = 0;
        for (const [token, entry] of this.cache) {
            if (entry.expiresAt <= now) {
                this.cache.delete(token);
                cached++;
            }
        }

        let pending = 0;
        const oldest = now - this.config.pendingTokenTtlMs;
        for (const [token, entry] of this.pending) {
            if (entry.createdAt <= oldest) {
                this.pending.delete(token);
                pending++;
            }
        }

        if (pending || cached) {
            console.log(`[SynthesisTokenStore] Swept ${pending} stale pending token(s), ${cached} expired audio entr(ies)`);
        }
        return { pending, cached };
    }

    public startSweeper(): void {
        if (this.sweeper) return;
        this.sweeper = setInterval(() => this.sweep(), this.config.tokenSweepIntervalMs);
        this.sweeper.unref();
    }

    public stopSweeper(): void {
        if (!this.sweeper) return;
        clearInterval(this.sweeper);
        this.sweeper = null;
    }

    public stats(): { pending: number; generating: number; cached: number } {
        return { pending: this.pending.size, generating: this.generating.size, cached: this.cache.size };
    }
}
