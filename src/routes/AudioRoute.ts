// src/routes/AudioRoute.ts
import { Router } from "express";
import { AudioController } from "../controllers/AudioController";

export function createAudioRouter(controller: AudioController): Router {
    const router = Router();
    router.get("/tts_stream/:token", controller.ttsStream.bind(controller));
    return router;
}
