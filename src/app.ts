// src/app.ts
import express, { Express, NextFunction, Request, Response } from "express";
import cors from "cors";
import multer from "multer";
import config from "./config/config";
import { AudioController } from "./controllers/AudioController";
import { CallController } from "./controllers/CallController";
import { createAudioRouter } from "./routes/AudioRoute";
import { createCallRouter } from "./routes/CallRoute";

export type AppControllers = {
    call?: CallController;
    audio?: AudioController;
};

/** Controllers left out are resolved from the container. */
export function createApp(controllers: AppControllers = {}, maxUploadMb = config.maxUploadMb): Express {
    const app = express();

    app.set("trust proxy", true);
    app.use(cors());
    app.use(express.json({ limit: "2mb" }));
    app.use(express.urlencoded({ extended: true }));

    //health check endpoint
    app.get("/health", (_req, res) => {
        res.status(200).json({ status: "OK" });
    });

    app.use("/api", createCallRouter(controllers.call ?? new CallController(), maxUploadMb));
    app.use("/api", createAudioRouter(controllers.audio ?? new AudioController()));

    app.use((_req: Request, res: Response) => {
        res.status(404).json({ error: "Endpoint not found" });
    });

    app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
        if (res.headersSent) return next(err);
        if (err instanceof multer.MulterError) {
            res.status(400).json({ error: "Invalid request", message: err.message });
            return;
        }
        console.error("❌ Unhandled error:", err);
        res.status(500).json({ error: "Internal server error" });
    });

    return app;
}
