// src/business/services/ResponseOrchestrator.ts
import { inject, injectable } from "tsyringe";
import type { Config } from "../../config/config";
import { WhisperClient } from "../../clients/WhisperClient";
import { detectPhoneNumber } from "../../utils/phone";
import { SentenceSplitter } from "../../utils/tts/SentenceSplitter";
import type { AudioUpload, TurnEvent, TurnResult } from "../models/TurnModel";
import { AnswerGenerationService } from "./AnswerGenerationService";
import { CallLogService } from "./CallLogService";
import { SynthesisTokenStore } from "./SynthesisTokenStore";

export const UNCLEAR_AUDIO_REPLY = "Could not hear you clearly. Please speak again.";
export const UNCLEAR_AUDIO_STREAM_REPLY = "Could not hear you clearly. Please try again.";
export const LEAD_CAPTURED_REPLY = "Thank you. Our admissions office will contact you soon.";
export const STREAM_FAILURE_TEXT = "Server error";

const MIN_TRANSCRIPT_CHARS = 3;

type Reply = { text: string; escalated: boolean; leadCaptured: boolean };

export const audioUrlFor = (token: string): string => `/api/tts_stream/${token}`;

/**
 * One caller turn: transcript -> (phone interrupt | answer) -> call record ->
 * synthesis tokens. Audio itself is produced later, when the client fetches
 * the token URL.
 */
@injectable()
export class ResponseOrchestrator {
    constructor(
        @inject("Config") private readonly config: Config,
        @inject(WhisperClient) private readonly transcriber: WhisperClient,
        @inject(AnswerGenerationService) private readonly answers: AnswerGenerationService,
        @inject(CallLogService) private readonly callLog: CallLogService,
        @inject(SynthesisTokenStore) private readonly tokenStore: SynthesisTokenStore
    ) {}

    /** Whole reply under a single synthesis token. */
    public async processTurn(sessionId: string, upload: AudioUpload): Promise<TurnResult> {
        const transcript = await this.transcribe(sessionId, upload);
        if (transcript.length < MIN_TRANSCRIPT_CHARS) {
            return { kind: "transcription_empty", transcript, message: UNCLEAR_AUDIO_REPLY };
        }

        const reply = await this.reply(sessionId, transcript);
        const token = this.tokenStore.create(reply.text);
        return {
            kind: "reply",
            transcript,
            reply: reply.text,
            audioUrl: audioUrlFor(token),
            escalated: reply.escalated,
        };
    }

    /**
     * transcript, then one sentence event per sentence (its token is created
     * right before the event), then done. A turn that cannot be heard yields a
     * single error event.
     */
    public async *streamTurn(sessionId: string, upload: AudioUpload): AsyncGenerator<TurnEvent, void, undefined> {
        try {
            const transcript = await this.transcribe(sessionId, upload);
            if (transcript.length < MIN_TRANSCRIPT_CHARS) {
                yield { type: "error", text: UNCLEAR_AUDIO_STREAM_REPLY };
                return;
            }
            yield { type: "transcript", text: transcript };

            const reply = await this.reply(sessionId, transcript);
            // The lead acknowledgment is spoken as one unit
            const sentences = reply.leadCaptured ? [reply.text] : SentenceSplitter.split(reply.text);
            for (const sentence of sentences) {
                const token = this.tokenStore.create(sentence);
                yield { type: "sentence", text: sentence, audio_url: audioUrlFor(token) };
            }
            yield { type: "done" };
        } catch (error) {
            console.error(`[ResponseOrchestrator] Stream turn failed for ${sessionId}:`, error);
            yield { type: "error", text: STREAM_FAILURE_TEXT };
        }
    }

    private async transcribe(sessionId: string, upload: AudioUpload): Promise<string> {
        const transcript = (await this.transcriber.transcribe(upload)).trim();
        console.log(`[ResponseOrchestrator] Transcript [${sessionId}]: ${transcript}`);
        return transcript;
    }

    /** Phone numbers short-circuit retrieval and generation. */
    private async reply(sessionId: string, transcript: string): Promise<Reply> {
        const phone = detectPhoneNumber(transcript);
        if (phone) {
            const unansweredQuery = (await this.callLog.getLastUserQuery(sessionId)) ?? transcript;
            await this.callLog.logLead(sessionId, phone, unansweredQuery);
            await this.callLog.recordTurn(sessionId, { user: transcript, agent: LEAD_CAPTURED_REPLY }, true, phone);
            console.log(`[ResponseOrchestrator] Phone captured for ${sessionId}`);
            return { text: LEAD_CAPTURED_REPLY, escalated: true, leadCaptured: true };
        }

        const history = await this.callLog.getRecentTurns(sessionId, this.config.historyTurns);
        const answer = await this.answers.generate(transcript, history);
        await this.callLog.recordTurn(sessionId, { user: transcript, agent: answer.reply }, answer.escalated);
        console.log(
            `[ResponseOrchestrator] Reply [${sessionId}] (${answer.outcome}, escalated=${answer.escalated}): ${answer.reply}`
        );
        return { text: answer.reply, escalated: answer.escalated, leadCaptured: false };
    }
}
