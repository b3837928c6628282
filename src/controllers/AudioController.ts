// src/controllers/AudioController.ts
import { Request, Response } from "express";
import { container } from "tsyringe";
import type { AudioDelivery } from "../business/models/AudioDeliveryModel";
import { AudioDeliveryService } from "../business/services/AudioDeliveryService";
import { parseByteRange } from "../utils/httpRange";

export class AudioController {
    constructor(private readonly audioDelivery: AudioDeliveryService = container.resolve(AudioDeliveryService)) {}

    public async ttsStream(req: Request, res: Response) {
        const { token } = req.params;

        // Listen before delivery starts: the caller may hang up while the first chunk is pending
        let disconnected = false;
        res.on("close", () => {
            disconnected = true;
        });

        let delivery: AudioDelivery;
        try {
            delivery = await this.audioDelivery.deliver(token, req.get("user-agent"));
        } catch (error) {
            console.error("[AudioController] Audio delivery failed", error);
            res.status(500).json({ error: "Audio generation failed" });
            return;
        }

        switch (delivery.kind) {
            case "not_found":
                res.status(404).json({ error: "Token not found" });
                return;
            case "failed":
                res.status(500).json({ error: "Audio generation failed" });
                return;
            case "buffer":
                this.sendBuffer(req, res, delivery.audio);
                return;
            case "stream":
                await this.sendStream(res, delivery.chunks, () => disconnected || res.destroyed);
                return;
        }
    }

    private sendBuffer(req: Request, res: Response, audio: Buffer) {
        res.setHeader("Content-Type", "audio/mpeg");
        res.setHeader("Cache-Control", "public, max-age=3600");
        res.setHeader("Accept-Ranges", "bytes");

        const range = parseByteRange(req.get("range"), audio.length);
        if (range === "unsatisfiable") {
            res.setHeader("Content-Range", `bytes */${audio.length}`);
            res.status(416).end();
            return;
        }
        if (range) {
            const slice = audio.subarray(range.start, range.end + 1);
            res.setHeader("Content-Range", `bytes ${range.start}-${range.end}/${audio.length}`);
            res.setHeader("Content-Length", String(slice.length));
            res.status(206).end(slice);
            return;
        }

        res.setHeader("Content-Length", String(audio.length));
        res.status(200).end(audio);
    }

    private async sendStream(
        res: Response,
        chunks: AsyncGenerator<Buffer, void, undefined>,
        clientGone: () => boolean
    ) {
        res.setHeader("Content-Type", "audio/mpeg");
        res.setHeader("Cache-Control", "no-cache, no-store");
        res.setHeader("X-Content-Type-Options", "nosniff");
        res.setHeader("Accept-Ranges", "none");

        try {
            for await (const chunk of chunks) {
                // break runs the generator's cleanup, which closes the synthesis socket
                if (clientGone()) break;
                if (!res.write(chunk)) await drained(res);
            }
        } catch (error) {
            console.error("[AudioController] Streaming interrupted", error);
        }
        if (!res.destroyed) res.end();
    }
}

/** Resolves once the response can take more data or the connection is gone. */
const drained = (res: Response): Promise<void> =>
    new Promise((resolve) => {
        const done = () => {
            res.off("drain", done);
            res.off("close", done);
            resolve();
        };
        res.on("drain", done);
        res.on("close", done);
    });
