// src/business/services/SpeechSynthesisService.ts
import type { Readable } from "stream";
import { inject, injectable } from "tsyringe";
import { ElevenLabsClient } from "../../clients/ElevenLabsClient";
import type { Config } from "../../config/config";
import { withDeadline } from "../../utils/deadline";
import type { SynthesisEnd, SynthesisOutcome } from "../models/SynthesisModel";

export interface SpeechEngine {
    stream(text: string): Readable;
}

/**
 * Wraps the hosted TTS engine. The streaming form forwards chunks as the
 * engine emits them; the buffered form only drains the streaming form, so
 * both delivery modes carry identical audio.
 */
@injectable()
export class SpeechSynthesisService {
    constructor(
        @inject(ElevenLabsClient) private readonly engine: SpeechEngine,
        @inject("Config") private readonly config: Config
    ) {}

    /**
     * Lazy, finite, single-use sequence of audio chunks. Every call starts a
     * new synthesis. The whole run is bounded by the synthesis timeout; errors
     * and timeouts end the sequence and are reported as its return value.
     */
    public async *synthesizeStreaming(text: string): AsyncGenerator<Buffer, SynthesisEnd, undefined> {
        const deadline = Date.now() + this.config.synthesisTimeoutMs;
        let chunks = 0;
        let bytes = 0;

        let source: Readable;
        try {
            source = this.engine.stream(text);
        } catch (error) {
            console.error("[SpeechSynthesis] Could not start synthesis:", error);
            return { kind: "failure", chunks, error };
        }

        const iterator: AsyncIterator<unknown> = source[Symbol.asyncIterator]();
        try {
            while (true) {
                const next = await withDeadline(iterator.next(), deadline - Date.now());
                if (next.timedOut) {
                    console.error(
                        `[SpeechSynthesis] Timed out after ${this.config.synthesisTimeoutMs}ms (${chunks} chunks received)`
                    );
                    return { kind: "timeout", chunks };
                }
                if (next.value.done) {
                    return { kind: "completed", chunks, bytes };
                }

                const chunk = next.value.value;
                if (!Buffer.isBuffer(chunk) || chunk.length === 0) continue;
                chunks++;
                bytes += chunk.length;
                yield chunk;
            }
        } catch (error) {
            console.error("[SpeechSynthesis] Synthesis failed:", error);
            return { kind: "failure", chunks, error };
        } finally {
            // Abandons the engine call if it is still running
            source.destroy();
        }
    }

    /** Complete payload, or the reason there is none. */
    public async synthesizeBuffered(text: string): Promise<SynthesisOutcome> {
        const parts: Buffer[] = [];
        const sequence = this.synthesizeStreaming(text);

        let step = await sequence.next();
        while (!step.done) {
            parts.push(step.value);
            step = await sequence.next();
        }

        const end = step.value;
        if (end.kind === "completed" && parts.length) {
            return { kind: "audio", audio: Buffer.concat(parts) };
        }
        return end.kind === "timeout" ? { kind: "timeout" } : { kind: "failure" };
    }
}
