// src/clients/ElevenLabsClient.ts
import WebSocket from "ws";
import { PassThrough, Readable } from "stream";
import { inject, injectable } from "tsyringe";
import { z } from "zod";
import type { Config } from "../config/config";

const frameSchema = z
    .object({
        audio: z.string().nullish(),
        isFinal: z.boolean().nullish(),
        error: z.string().nullish(),
        message: z.string().nullish(),
    })
    .passthrough();

@injectable()
export class ElevenLabsClient {
    constructor(@inject("Config") private readonly config: Config) {}

    private urlFor(voiceId: string) {
        const { elevenLabsModelId, elevenLabsOutputFormat } = this.config;
        return `wss://api.elevenlabs.io/v1/text-to-speech/${voiceId}/stream-input?model_id=${elevenLabsModelId}&output_format=${elevenLabsOutputFormat}`;
    }

    /**
     * One-shot synthesis: sends the whole text in the first message (together
     * with voice_settings) followed by the end-of-input marker, and returns a
     * readable that emits audio chunks as the engine produces them. Ends when
     * the engine reports the final frame; destroying the readable closes the
     * socket.
     */
    public stream(text: string, voiceId = this.config.elevenLabsVoiceId): Readable {
        const output = new PassThrough();
        const ws = new WebSocket(this.urlFor(voiceId), {
            headers: { "xi-api-key": this.config.elevenLabsApiKey },
        });
        let settled = false;

        const closeSocket = () => {
            if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
                try {
                    ws.close(1000);
                } catch (e) {
                    console.warn("[ElevenLabs] stream(): close failed:", e);
                }
            }
        };

        const finish = (error?: Error) => {
            if (settled) return;
            settled = true;
            if (error) output.destroy(error);
            else output.end();
            closeSocket();
        };

        ws.on("open", () => {
            if (ws.readyState !== WebSocket.OPEN) return;
            try {
                ws.send(
                    JSON.stringify({
                        voice_settings: { stability: 0.5, similarity_boost: 0.8 },
                        text: text.endsWith(" ") ? text : `${text} `,
                        try_trigger_generation: true,
                        flush: true,
                    })
                );
                ws.send(JSON.stringify({ text: "" }));
            } catch (e) {
                finish(e instanceof Error ? e : new Error(String(e)));
            }
        });

        ws.on("message", (data: WebSocket.RawData) => {
            let frame: z.infer<typeof frameSchema>;
            try {
                frame = frameSchema.parse(JSON.parse(data.toString()));
            } catch (e) {
                console.error("[ElevenLabs] stream(): unreadable frame:", e);
                return;
            }

            if (frame.error) {
                finish(new Error(`ElevenLabs error: ${frame.message ?? frame.error}`));
                return;
            }
            if (frame.audio && !settled) {
                output.write(Buffer.from(frame.audio, "base64"));
            }
            if (frame.isFinal) finish();
        });

        ws.on("close", (code, reason) => {
            if (code !== 1000 && code !== 1005) {
                finish(new Error(`ElevenLabs socket closed unexpectedly code=${code} reason=${reason.toString()}`));
                return;
            }
            finish();
        });

        ws.on("error", (err) => {
            finish(err);
        });

        // Consumer gave up (timeout or client disconnect)
        output.on("close", () => {
            if (settled) return;
            settled = true;
            closeSocket();
        });

        return output;
    }
}
