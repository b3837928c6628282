// src/routes/CallRoute.ts
import { Router } from "express";
import multer from "multer";
import { CallController } from "../controllers/CallController";

export function createCallRouter(controller: CallController, maxUploadMb: number): Router {
    const router = Router();

    const audioUpload = multer({
        storage: multer.memoryStorage(),
        limits: { fileSize: maxUploadMb * 1024 * 1024 },
    });

    router.post("/start_call", controller.startCall.bind(controller));
    router.post("/query", audioUpload.single("audio"), controller.query.bind(controller));
    router.post("/query_stream", audioUpload.single("audio"), controller.queryStream.bind(controller));
    router.post("/end_call", controller.endCall.bind(controller));

    return router;
}
