import "reflect-metadata";
import axios from "axios";
import FormData from "form-data";
import { Server } from "http";
import { Readable } from "stream";
import { createApp } from "../src/app";
import { AnswerGenerationService } from "../src/business/services/AnswerGenerationService";
import { AudioDeliveryService } from "../src/business/services/AudioDeliveryService";
import { CallLogService } from "../src/business/services/CallLogService";
import { CallService } from "../src/business/services/CallService";
import { ContextRetrievalService } from "../src/business/services/ContextRetrievalService";
import { ResponseOrchestrator } from "../src/business/services/ResponseOrchestrator";
import { SpeechEngine, SpeechSynthesisService } from "../src/business/services/SpeechSynthesisService";
import { SynthesisTokenStore } from "../src/business/services/SynthesisTokenStore";
import { GroqChatClient } from "../src/clients/GroqChatClient";
import { RoomTokenClient } from "../src/clients/RoomTokenClient";
import { WhisperClient } from "../src/clients/WhisperClient";
import { conversationPhrases, factSheet, retrievalRules, stopWords } from "../src/config/knowledge";
import { AudioController } from "../src/controllers/AudioController";
import { CallController } from "../src/controllers/CallController";
import { InMemoryCallLogRepository, InMemoryLeadLogRepository } from "./helpers/inMemoryRepositories";
import { makeConfig } from "./helpers/testConfig";

const IPHONE_UA = "Mozilla/5.0 (iPhone; CPU iPhone OS 17_4 like Mac OS X) AppleWebKit/605.1.15 Mobile/15E148";
const ANDROID_UA = "Mozilla/5.0 (Linux; Android 14; Pixel 8) AppleWebKit/537.36 Chrome/124.0 Mobile Safari/537.36";

const acceptAnyStatus = () => true;

const waitFor = async (condition: () => boolean, timeoutMs = 1000): Promise<void> => {
    const giveUpAt = Date.now() + timeoutMs;
    while (!condition()) {
        if (Date.now() > giveUpAt) throw new Error("condition not met in time");
        await new Promise((resolve) => setTimeout(resolve, 5));
    }
};

describe("HTTP controllers", () => {
    let engine: { stream: jest.Mock<Readable, [string]> };
    let tokenStore: SynthesisTokenStore;
    let transcriber: WhisperClient;
    let orchestrator: ResponseOrchestrator;
    let server: Server;
    let baseUrl: string;
    let logSpies: jest.SpyInstance[];

    beforeEach(async () => {
        logSpies = [
            jest.spyOn(console, "log").mockImplementation(() => undefined),
            jest.spyOn(console, "warn").mockImplementation(() => undefined),
            jest.spyOn(console, "error").mockImplementation(() => undefined),
        ];
        const config = makeConfig({ synthesisTimeoutMs: 5000, duplicateFetchWaitMs: 1000 });
        engine = {
            stream: jest.fn((text: string) => Readable.from([Buffer.from("mp3:"), Buffer.from(text)])),
        };
        const speechEngine: SpeechEngine = engine;
        tokenStore = new SynthesisTokenStore(config);

        const callLog = new CallLogService(new InMemoryCallLogRepository(), new InMemoryLeadLogRepository());
        transcriber = new WhisperClient(config);
        orchestrator = new ResponseOrchestrator(
            config,
            transcriber,
            new AnswerGenerationService(
                config,
                new GroqChatClient(config),
                new ContextRetrievalService(config, retrievalRules, stopWords),
                retrievalRules,
                conversationPhrases,
                factSheet
            ),
            callLog,
            tokenStore
        );

        const app = createApp(
            {
                call: new CallController(
                    new CallService(callLog, new RoomTokenClient(config), tokenStore),
                    orchestrator
                ),
                audio: new AudioController(
                    new AudioDeliveryService(tokenStore, new SpeechSynthesisService(speechEngine, config), config)
                ),
            },
            1
        );

        server = await new Promise<Server>((resolve) => {
            const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
        });
        const address = server.address();
        if (!address || typeof address === "string") throw new Error("server is not listening on a port");
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    afterEach(async () => {
        server.closeAllConnections();
        await new Promise((resolve) => server.close(resolve));
        logSpies.forEach((spy) => spy.mockRestore());
    });

    describe("turn endpoints", () => {
        const audioOnly = () => {
            const form = new FormData();
            form.append("audio", Buffer.from("fake-audio"), { filename: "clip.webm", contentType: "audio/webm" });
            return form;
        };

        const sessionOnly = () => {
            const form = new FormData();
            form.append("session_id", "session-1");
            return form;
        };

        it.each<[string, string, () => FormData]>([
            ["/api/query", "missing session_id", audioOnly],
            ["/api/query", "missing audio", sessionOnly],
            ["/api/query_stream", "missing session_id", audioOnly],
            ["/api/query_stream", "missing audio", sessionOnly],
        ])("rejects %s with %s before any processing", async (route, _case, buildForm) => {
            const processTurn = jest.spyOn(orchestrator, "processTurn");
            const streamTurn = jest.spyOn(orchestrator, "streamTurn");
            const transcribe = jest.spyOn(transcriber, "transcribe");
            const form = buildForm();

            const response = await axios.post<unknown>(`${baseUrl}${route}`, form, {
                headers: form.getHeaders(),
                validateStatus: acceptAnyStatus,
            });

            expect(response.status).toBe(400);
            expect(response.data).toEqual({ error: "Invalid request" });
            expect(processTurn).not.toHaveBeenCalled();
            expect(streamTurn).not.toHaveBeenCalled();
            expect(transcribe).not.toHaveBeenCalled();
        });

        it("returns the transcript, reply and audio URL of a turn", async () => {
            jest.spyOn(orchestrator, "processTurn").mockResolvedValue({
                kind: "reply",
                transcript: "what is the fee",
                reply: "1 lakh 48 thousand rupees per semester.",
                audioUrl: "/api/tts_stream/token-1",
                escalated: false,
            });
            const form = audioOnly();
            form.append("session_id", "session-1");

            const response = await axios.post<unknown>(`${baseUrl}/api/query`, form, {
                headers: form.getHeaders(),
                validateStatus: acceptAnyStatus,
            });

            expect(response.status).toBe(200);
            expect(response.data).toEqual({
                user_text: "what is the fee",
                response: "1 lakh 48 thousand rupees per semester.",
                audio_url: "/api/tts_stream/token-1",
            });
        });
    });

    describe("audio delivery", () => {
        const fetchAudio = (token: string, headers: Record<string, string>) =>
            axios.get<Buffer>(`${baseUrl}/api/tts_stream/${token}`, {
                headers,
                responseType: "arraybuffer",
                validateStatus: acceptAnyStatus,
            });

        it("answers an unknown token with 404", async () => {
            const response = await axios.get<unknown>(`${baseUrl}/api/tts_stream/no-such-token`, {
                headers: { "User-Agent": ANDROID_UA },
                validateStatus: acceptAnyStatus,
            });

            expect(response.status).toBe(404);
            expect(response.data).toEqual({ error: "Token not found" });
        });

        it("answers a synthesis that produced nothing with 500", async () => {
            engine.stream.mockImplementation(() => Readable.from([]));
            const token = tokenStore.create("Silence.");

            const response = await axios.get<unknown>(`${baseUrl}/api/tts_stream/${token}`, {
                headers: { "User-Agent": ANDROID_UA },
                validateStatus: acceptAnyStatus,
            });

            expect(response.status).toBe(500);
            expect(response.data).toEqual({ error: "Audio generation failed" });
        });

        it("streams audio with no-cache headers", async () => {
            const token = tokenStore.create("Hello.");

            const response = await fetchAudio(token, { "User-Agent": ANDROID_UA });

            expect(response.status).toBe(200);
            expect(response.headers["content-type"]).toBe("audio/mpeg");
            expect(response.headers["cache-control"]).toBe("no-cache, no-store");
            expect(response.headers["x-content-type-options"]).toBe("nosniff");
            expect(response.headers["accept-ranges"]).toBe("none");
            expect(Buffer.from(response.data).toString()).toBe("mp3:Hello.");
        });

        it("serves a single byte range of buffered audio", async () => {
            const token = tokenStore.create("Hello.");

            const response = await fetchAudio(token, { "User-Agent": IPHONE_UA, Range: "bytes=0-3" });

            expect(response.status).toBe(206);
            expect(response.headers["content-range"]).toBe("bytes 0-3/10");
            expect(response.headers["accept-ranges"]).toBe("bytes");
            expect(Buffer.from(response.data).toString()).toBe("mp3:");
        });

        it("serves the whole buffered payload with cache headers", async () => {
            const token = tokenStore.create("Hello.");

            const response = await fetchAudio(token, { "User-Agent": IPHONE_UA });

            expect(response.status).toBe(200);
            expect(response.headers["content-length"]).toBe("10");
            expect(response.headers["cache-control"]).toBe("public, max-age=3600");
            expect(Buffer.from(response.data).toString()).toBe("mp3:Hello.");
        });

        it("answers a range outside the payload with 416", async () => {
            const token = tokenStore.create("Hello.");

            const response = await fetchAudio(token, { "User-Agent": IPHONE_UA, Range: "bytes=50-60" });

            expect(response.status).toBe(416);
            expect(response.headers["content-range"]).toBe("bytes */10");
        });

        it("stops synthesis when the listener hangs up before the first chunk", async () => {
            const source = new Readable({ read() {} });
            engine.stream.mockImplementation(() => source);
            const token = tokenStore.create("A long answer.");
            const abort = new AbortController();

            const request = axios
                .get(`${baseUrl}/api/tts_stream/${token}`, {
                    headers: { "User-Agent": ANDROID_UA },
                    responseType: "stream",
                    signal: abort.signal,
                })
                .catch((error: unknown) => error);
            await waitFor(() => engine.stream.mock.calls.length === 1);

            abort.abort();
            await request;
            await new Promise((resolve) => setTimeout(resolve, 50));
            source.push(Buffer.from("mp3:"));

            await waitFor(() => source.destroyed);
            expect(source.destroyed).toBe(true);
        });
    });
});
