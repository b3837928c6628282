import "reflect-metadata";
import { createServer } from "http";
import { container } from "tsyringe";
import "./container";
import config from "./config/config";
import { createApp } from "./app";
import { ContextRetrievalService } from "./business/services/ContextRetrievalService";
import { SynthesisTokenStore } from "./business/services/SynthesisTokenStore";

const app = createApp();

const server = createServer(app);
const retrieval = container.resolve(ContextRetrievalService);
const tokenStore = container.resolve(SynthesisTokenStore);

async function start() {
    try {
        await retrieval.initialize();
    } catch (error) {
        // Serve anyway: turns escalate until documents can be indexed
        console.error("❌ Failed to build context index:", error);
    }
    tokenStore.startSweeper();
    server.listen(config.port, () => console.log(`✅ Server running on port ${config.port}`));
}

const shutdown = () => {
    tokenStore.stopSweeper();
    server.close(() => process.exit(0));
};
process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

void start();
