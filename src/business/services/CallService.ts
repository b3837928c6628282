// src/business/services/CallService.ts
import crypto from "crypto";
import { inject, injectable } from "tsyringe";
import { RoomTokenClient } from "../../clients/RoomTokenClient";
import type { CallStart } from "../models/TurnModel";
import { CallLogService } from "./CallLogService";
import { audioUrlFor } from "./ResponseOrchestrator";
import { SynthesisTokenStore } from "./SynthesisTokenStore";

export const GREETING_TEXT = "Hello, this is Institute of Space Technology. How can I help you today?";

@injectable()
export class CallService {
    constructor(
        @inject(CallLogService) private readonly callLog: CallLogService,
        @inject(RoomTokenClient) private readonly roomTokens: RoomTokenClient,
        @inject(SynthesisTokenStore) private readonly tokenStore: SynthesisTokenStore
    ) {}

    public async startCall(): Promise<CallStart> {
        const sessionId = crypto.randomUUID();
        const roomName = `room_${sessionId}`;

        await this.callLog.initCall(sessionId);
        const roomToken = this.roomTokens.issue(roomName, sessionId);
        const greetingToken = this.tokenStore.create(GREETING_TEXT);

        console.log(`[CallService] Call started: ${sessionId}`);
        return { sessionId, roomName, roomToken, greetingAudioUrl: audioUrlFor(greetingToken) };
    }

    /** Throws ResourceNotFoundError for an unknown session. */
    public async endCall(sessionId: string): Promise<void> {
        await this.callLog.endCall(sessionId);
        console.log(`[CallService] Call ended: ${sessionId}`);
    }
}
