// src/business/services/AudioDeliveryService.ts
import { inject, injectable } from "tsyringe";
import type { Config } from "../../config/config";
import { withDeadline } from "../../utils/deadline";
import type { AudioDelivery, ClientPlaybackClass } from "../models/AudioDeliveryModel";
import type { SynthesisOutcome } from "../models/SynthesisModel";
import { SpeechSynthesisService } from "./SpeechSynthesisService";
import { SynthesisTokenStore } from "./SynthesisTokenStore";

// Playback stacks that cannot consume chunked-transfer MP3 reliably
const BUFFERING_CLIENT_MARKERS = ["iphone", "ipad", "ipod", "crios", "fxios"];

const shortToken = (token: string) => token.slice(0, 8);

@injectable()
export class AudioDeliveryService {
    constructor(
        @inject(SynthesisTokenStore) private readonly tokenStore: SynthesisTokenStore,
        @inject(SpeechSynthesisService) private readonly synthesizer: SpeechSynthesisService,
        @inject("Config") private readonly config: Config
    ) {}

    public static detectClientClass(userAgent: string | undefined | null): ClientPlaybackClass {
        const ua = (userAgent ?? "").toLowerCase();
        return BUFFERING_CLIENT_MARKERS.some((marker) => ua.includes(marker)) ? "buffering" : "streaming";
    }

    public async deliver(token: string, userAgent: string | undefined | null): Promise<AudioDelivery> {
        return AudioDeliveryService.detectClientClass(userAgent) === "buffering"
            ? this.deliverBuffered(token)
            : this.deliverStreaming(token);
    }

    /**
     * Chunked delivery, single consumer. The first chunk is pulled before
     * returning so a synthesis that produces nothing can still become an
     * HTTP error instead of an empty 200.
     */
    public async deliverStreaming(token: string): Promise<AudioDelivery> {
        const text = this.tokenStore.consume(token);
        if (text === null) {
            console.warn(`[AudioDelivery] Token not found: ${shortToken(token)}`);
            return { kind: "not_found" };
        }

        console.log(`[AudioDelivery] Streaming mode: token ${shortToken(token)}`);
        const sequence = this.synthesizer.synthesizeStreaming(text);
        const first = await sequence.next();
        if (first.done) {
            const reason = first.value.kind === "timeout" ? "timeout" : "failure";
            return { kind: "failed", reason };
        }

        const head = first.value;
        async function* replay(): AsyncGenerator<Buffer, void, undefined> {
            try {
                yield head;
                yield* sequence;
            } finally {
                // Closes the synthesis when the consumer stops early
                await sequence.return({ kind: "cancelled" });
            }
        }
        return { kind: "stream", chunks: replay() };
    }

    /**
     * Whole-payload delivery with cache-and-wait for duplicate fetches of the
     * same token (range probing by buffering clients).
     */
    public async deliverBuffered(token: string): Promise<AudioDelivery> {
        const cached = this.tokenStore.getCached(token);
        if (cached) {
            return { kind: "buffer", audio: cached, fromCache: true };
        }

        const started = this.tokenStore.beginGeneration(token, (text) => this.synthesizer.synthesizeBuffered(text));
        if (started) {
            console.log(`[AudioDelivery] Buffered mode: token ${shortToken(token)}`);
            const outcome = await this.settle(started, token);
            if (outcome.kind === "audio") {
                return { kind: "buffer", audio: outcome.audio, fromCache: false };
            }
            console.error(`[AudioDelivery] Buffered synthesis ${outcome.kind}: token ${shortToken(token)}`);
            return { kind: "failed", reason: outcome.kind };
        }

        const inFlight = this.tokenStore.getGenerating(token);
        if (inFlight) {
            console.log(`[AudioDelivery] Waiting for in-flight synthesis: token ${shortToken(token)}`);
            try {
                const waited = await withDeadline(inFlight, this.config.duplicateFetchWaitMs);
                if (!waited.timedOut && waited.value.kind === "audio") {
                    return { kind: "buffer", audio: waited.value.audio, fromCache: true };
                }
            } catch (error) {
                console.error(`[AudioDelivery] In-flight synthesis failed: token ${shortToken(token)}`, error);
            }
            const late = this.tokenStore.getCached(token);
            if (late) return { kind: "buffer", audio: late, fromCache: true };
        }

        console.warn(`[AudioDelivery] Token not found: ${shortToken(token)}`);
        return { kind: "not_found" };
    }

    private async settle(work: Promise<SynthesisOutcome>, token: string): Promise<SynthesisOutcome> {
        try {
            return await work;
        } catch (error) {
            console.error(`[AudioDelivery] Buffered synthesis threw: token ${shortToken(token)}`, error);
            return { kind: "failure" };
        }
    }
}
