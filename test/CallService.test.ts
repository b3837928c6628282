import "reflect-metadata";
import jwt, { JwtPayload } from "jsonwebtoken";
import { CallLogService } from "../src/business/services/CallLogService";
import { CallService, GREETING_TEXT } from "../src/business/services/CallService";
import { SynthesisTokenStore } from "../src/business/services/SynthesisTokenStore";
import { ResourceNotFoundError } from "../src/business/errors/ResourceNotFoundError";
import { RoomTokenClient } from "../src/clients/RoomTokenClient";
import { InMemoryCallLogRepository, InMemoryLeadLogRepository } from "./helpers/inMemoryRepositories";
import { makeConfig } from "./helpers/testConfig";

describe("CallService", () => {
    let callRepository: InMemoryCallLogRepository;
    let tokenStore: SynthesisTokenStore;
    let logSpies: jest.SpyInstance[];

    const build = (withRoomCredentials = true) => {
        const config = makeConfig({
            livekitApiKey: "test-livekit-key",
            livekitApiSecret: withRoomCredentials ? "test-livekit-secret" : undefined,
        });
        tokenStore = new SynthesisTokenStore(config);
        return new CallService(
            new CallLogService(callRepository, new InMemoryLeadLogRepository()),
            new RoomTokenClient(config),
            tokenStore
        );
    };

    beforeEach(() => {
        logSpies = [
            jest.spyOn(console, "log").mockImplementation(() => undefined),
            jest.spyOn(console, "error").mockImplementation(() => undefined),
        ];
        callRepository = new InMemoryCallLogRepository();
    });

    afterEach(() => {
        logSpies.forEach((spy) => spy.mockRestore());
    });

    it("starts a call with a room, a room token and a greeting", async () => {
        const call = await build().startCall();

        expect(call.roomName).toBe(`room_${call.sessionId}`);
        expect(callRepository.records.get(call.sessionId)).toMatchObject({ turns: [], escalated: false, phone: null });

        const greetingToken = call.greetingAudioUrl.replace("/api/tts_stream/", "");
        expect(tokenStore.consume(greetingToken)).toBe(GREETING_TEXT);

        const payload = jwt.verify(call.roomToken ?? "", "test-livekit-secret");
        if (typeof payload === "string") throw new Error("expected a JWT payload object");
        const claims: JwtPayload = payload;
        expect(claims.iss).toBe("test-livekit-key");
        expect(claims.sub).toBe(call.sessionId);
        expect(claims.video).toEqual({
            room: call.roomName,
            roomJoin: true,
            canPublish: true,
            canPublishData: true,
            canSubscribe: true,
        });
    });

    it("still starts a call when room credentials are missing", async () => {
        const call = await build(false).startCall();

        expect(call.roomToken).toBeNull();
        expect(callRepository.records.has(call.sessionId)).toBe(true);
    });

    it("stamps the end time on the call record", async () => {
        const service = build();
        const call = await service.startCall();

        await service.endCall(call.sessionId);

        expect(callRepository.records.get(call.sessionId)?.endTime).toEqual(expect.any(String));
    });

    it("rejects ending an unknown call", async () => {
        await expect(build().endCall("no-such-session")).rejects.toBeInstanceOf(ResourceNotFoundError);
    });
});
