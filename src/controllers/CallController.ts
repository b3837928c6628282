// src/controllers/CallController.ts
import { Request, Response } from "express";
import { container } from "tsyringe";
import { z } from "zod";
import { CallService } from "../business/services/CallService";
import { ResponseOrchestrator } from "../business/services/ResponseOrchestrator";
import { InvalidRequestError } from "../business/errors/InvalidRequestError";
import { ResourceNotFoundError } from "../business/errors/ResourceNotFoundError";
import type { AudioUpload } from "../business/models/TurnModel";
import { toAudioUpload } from "../utils/audioUpload";

const sessionSchema = z.object({ session_id: z.string().trim().min(1) });

export class CallController {
    constructor(
        private readonly callService: CallService = container.resolve(CallService),
        private readonly orchestrator: ResponseOrchestrator = container.resolve(ResponseOrchestrator)
    ) {}

    public async startCall(_req: Request, res: Response) {
        try {
            const call = await this.callService.startCall();
            res.json({
                session_id: call.sessionId,
                livekit_token: call.roomToken,
                room_name: call.roomName,
                greeting_audio_url: call.greetingAudioUrl,
            });
        } catch (error) {
            console.error("[CallController] Failed to start call", error);
            res.status(500).json({ error: "Failed to start call" });
        }
    }

    public async query(req: Request, res: Response) {
        let input: { sessionId: string; upload: AudioUpload };
        try {
            input = CallController.parseTurnRequest(req);
        } catch (error) {
            this.rejectInvalid(res, error);
            return;
        }

        try {
            const result = await this.orchestrator.processTurn(input.sessionId, input.upload);
            if (result.kind === "transcription_empty") {
                res.json({ error: result.message, user_text: result.transcript });
                return;
            }
            res.json({ user_text: result.transcript, response: result.reply, audio_url: result.audioUrl });
        } catch (error) {
            console.error("[CallController] Failed to process query", error);
            res.status(500).json({ error: "Failed to process query" });
        }
    }

    public async queryStream(req: Request, res: Response) {
        let input: { sessionId: string; upload: AudioUpload };
        try {
            input = CallController.parseTurnRequest(req);
        } catch (error) {
            this.rejectInvalid(res, error);
            return;
        }

        res.setHeader("Content-Type", "text/event-stream");
        res.setHeader("Cache-Control", "no-cache");
        res.setHeader("X-Accel-Buffering", "no");
        res.setHeader("Connection", "keep-alive");
        res.flushHeaders();

        let disconnected = false;
        res.on("close", () => {
            disconnected = true;
        });

        for await (const event of this.orchestrator.streamTurn(input.sessionId, input.upload)) {
            if (disconnected) break;
            res.write(`data: ${JSON.stringify(event)}\n\n`);
        }
        res.end();
    }

    public async endCall(req: Request, res: Response) {
        const parsed = sessionSchema.safeParse(req.body);
        if (!parsed.success) {
            res.status(400).json({ error: "Invalid request" });
            return;
        }

        try {
            await this.callService.endCall(parsed.data.session_id);
            res.json({ status: "ended" });
        } catch (error) {
            if (error instanceof ResourceNotFoundError) {
                res.status(error.statusCode).json({ error: error.message });
                return;
            }
            console.error("[CallController] Failed to end call", error);
            res.status(500).json({ error: "Failed to end call" });
        }
    }

    /** Both turn endpoints take multipart `session_id` + `audio`. */
    public static parseTurnRequest(req: Request): { sessionId: string; upload: AudioUpload } {
        const parsed = sessionSchema.safeParse(req.body);
        if (!parsed.success || !req.file || !req.file.buffer.length) {
            throw new InvalidRequestError();
        }
        return { sessionId: parsed.data.session_id, upload: toAudioUpload(req.file) };
    }

    private rejectInvalid(res: Response, error: unknown) {
        if (error instanceof InvalidRequestError) {
            res.status(error.statusCode).json({ error: error.message });
            return;
        }
        console.error("[CallController] Unexpected request parsing failure", error);
        res.status(500).json({ error: "Failed to process query" });
    }
}
