// src/clients/RoomTokenClient.ts
import jwt from "jsonwebtoken";
import { inject, injectable } from "tsyringe";
import type { Config } from "../config/config";

const TOKEN_TTL_SECONDS = 60 * 60;

/**
 * Issues access tokens for the real-time media room (LiveKit-compatible
 * HS256 JWT with a video grant).
 */
@injectable()
export class RoomTokenClient {
    constructor(@inject("Config") private readonly config: Config) {}

    public issue(roomName: string, participantId: string): string | null {
        const { livekitApiKey, livekitApiSecret } = this.config;
        if (!livekitApiKey || !livekitApiSecret) {
            console.error("[RoomToken] LiveKit credentials not set");
            return null;
        }

        try {
            return jwt.sign(
                {
                    video: {
                        room: roomName,
                        roomJoin: true,
                        canPublish: true,
                        canPublishData: true,
                        canSubscribe: true,
                    },
                },
                livekitApiSecret,
                {
                    algorithm: "HS256",
                    issuer: livekitApiKey,
                    subject: participantId,
                    notBefore: 0,
                    expiresIn: TOKEN_TTL_SECONDS,
                }
            );
        } catch (error) {
            console.error("[RoomToken] Failed to sign room token", error);
            return null;
        }
    }
}
