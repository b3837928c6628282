// src/clients/GroqChatClient.ts
import OpenAI from "openai";
import { inject, injectable } from "tsyringe";
import type { ChatCompletionMessageParam } from "openai/resources/chat";
import type { Config } from "../config/config";

export type ChatCompletionRequest = {
    model: string;
    messages: ChatCompletionMessageParam[];
    temperature: number;
    maxTokens: number;
};

/** Tri-state error classification the answer fallback ladder is built on. */
export type ChatCompletionResult =
    | { kind: "ok"; text: string }
    | { kind: "rate_limited"; error: unknown }
    | { kind: "unauthorized"; error: unknown }
    | { kind: "failed"; error: unknown };

@injectable()
export class GroqChatClient {
    private readonly clients = new Map<number, OpenAI>();

    constructor(@inject("Config") private readonly config: Config) {}

    public get credentialCount(): number {
        return this.config.groqApiKeys.length;
    }

    public async complete(credentialIndex: number, request: ChatCompletionRequest): Promise<ChatCompletionResult> {
        try {
            const response = await this.clientFor(credentialIndex).chat.completions.create({
                model: request.model,
                messages: request.messages,
                temperature: request.temperature,
                max_tokens: request.maxTokens,
            });
            const text = response.choices?.[0]?.message?.content?.trim() ?? "";
            return { kind: "ok", text };
        } catch (error) {
            return GroqChatClient.classify(error);
        }
    }

    public static classify(error: unknown): ChatCompletionResult {
        if (error instanceof OpenAI.APIError) {
            if (error.status === 429) return { kind: "rate_limited", error };
            if (error.status === 401 || error.status === 403) return { kind: "unauthorized", error };
        }
        return { kind: "failed", error };
    }

    private clientFor(credentialIndex: number): OpenAI {
        const keys = this.config.groqApiKeys;
        if (!keys.length) throw new Error("No GROQ API keys configured.");
        const idx = credentialIndex % keys.length;

        let client = this.clients.get(idx);
        if (!client) {
            client = new OpenAI({
                apiKey: keys[idx],
                baseURL: this.config.groqBaseUrl,
                timeout: 30_000,
                // With a single key waiting out a 429 is the only option; with more, fail fast and move on.
                maxRetries: keys.length === 1 ? 2 : 0,
            });
            this.clients.set(idx, client);
        }
        return client;
    }
}
