// src/business/services/AnswerGenerationService.ts
import { inject, injectable } from "tsyringe";
import type { ChatCompletionMessageParam } from "openai/resources/chat";
import type { Config } from "../../config/config";
import type { ConversationPhrases, FactSheet, RetrievalRules } from "../../config/knowledge";
import { ChatCompletionResult, GroqChatClient } from "../../clients/GroqChatClient";
import { containsAnyPhrase, phrasePattern, TranscriptNormalizer } from "../../utils/transcript/TranscriptNormalizer";
import type { AnswerResult } from "../models/AnswerModel";
import type { ConversationTurn } from "../models/ConversationTurnModel";
import { ContextRetrievalService } from "./ContextRetrievalService";

export const THANKS_REPLY = "You're welcome.";
export const COMPLIMENT_REPLY = "Thank you. Is there anything else I can help you with?";
export const FAREWELL_REPLY = "Thank you for calling. Goodbye.";
export const NO_CONTEXT_REPLY =
    "I don't have that information. Please provide your phone number and we will contact you.";
export const TECHNICAL_ISSUE_REPLY = "Technical issue. Let me connect you with admissions. Phone number?";
export const CHALLENGE_REPLY = "This information comes from the official sources of the university.";

const TEMPERATURE = 0.2;
const MAX_TOKENS = 150;

export type LadderAttempt = { credentialIndex: number; model: string };
type AttemptVerdict = "success" | "retriable" | "fatal_for_credential";

@injectable()
export class AnswerGenerationService {
    private readonly normalizer: TranscriptNormalizer;

    constructor(
        @inject("Config") private readonly config: Config,
        @inject(GroqChatClient) private readonly chatClient: GroqChatClient,
        @inject(ContextRetrievalService) private readonly retriever: ContextRetrievalService,
        @inject("RetrievalRules") rules: RetrievalRules,
        @inject("ConversationPhrases") private readonly phrases: ConversationPhrases,
        @inject("FactSheet") private readonly factSheet: FactSheet
    ) {
        this.normalizer = new TranscriptNormalizer(rules.corrections);
    }

    /** Never throws; every hosted failure ends in a fixed escalation reply. */
    public async generate(query: string, history: readonly ConversationTurn[]): Promise<AnswerResult> {
        const normalized = this.normalizer.normalize(query);
        const bare = TranscriptNormalizer.bare(normalized);

        if (this.consistsOnlyOf(bare, this.phrases.thanks)) {
            return { reply: THANKS_REPLY, escalated: false, outcome: "acknowledged" };
        }
        if (this.consistsOnlyOf(bare, this.phrases.compliments)) {
            return { reply: COMPLIMENT_REPLY, escalated: false, outcome: "acknowledged" };
        }
        if (containsAnyPhrase(bare, this.phrases.farewells)) {
            return { reply: FAREWELL_REPLY, escalated: false, outcome: "farewell" };
        }

        const context = this.retriever.retrieve(normalized, this.referenceHint(bare, history));
        if (!context.trim()) {
            console.warn("[AnswerGeneration] No context retrieved, escalating");
            return { reply: NO_CONTEXT_REPLY, escalated: true, outcome: "retrieval_empty" };
        }

        const messages = this.buildMessages(context, normalized, history);
        const reply = await this.runLadder(messages);
        if (reply === null) {
            console.error("[AnswerGeneration] Every credential/model attempt failed");
            return { reply: TECHNICAL_ISSUE_REPLY, escalated: true, outcome: "generation_exhausted" };
        }

        return { reply, escalated: this.isEscalation(reply), outcome: "answered" };
    }

    public isEscalation(reply: string): boolean {
        const lower = reply.toLowerCase();
        return this.phrases.escalationPhrases.some((phrase) => lower.includes(phrase));
    }

    /** Credentials outer, models inner. */
    public buildLadder(): LadderAttempt[] {
        const attempts: LadderAttempt[] = [];
        for (let credentialIndex = 0; credentialIndex < this.chatClient.credentialCount; credentialIndex++) {
            for (const model of this.config.groqModels) {
                attempts.push({ credentialIndex, model });
            }
        }
        return attempts;
    }

    public buildMessages(
        context: string,
        query: string,
        history: readonly ConversationTurn[]
    ): ChatCompletionMessageParam[] {
        const messages: ChatCompletionMessageParam[] = [{ role: "system", content: this.systemPrompt(context) }];
        for (const turn of history) {
            messages.push({ role: "user", content: turn.user });
            messages.push({ role: "assistant", content: turn.agent });
        }
        messages.push({ role: "user", content: query });
        return messages;
    }

    private async runLadder(messages: ChatCompletionMessageParam[]): Promise<string | null> {
        const abandoned = new Set<number>();

        for (const attempt of this.buildLadder()) {
            if (abandoned.has(attempt.credentialIndex)) continue;

            const result = await this.chatClient.complete(attempt.credentialIndex, {
                model: attempt.model,
                messages,
                temperature: TEMPERATURE,
                maxTokens: MAX_TOKENS,
            });

            switch (AnswerGenerationService.judge(result)) {
                case "success":
                    if (result.kind === "ok") return result.text;
                    break;
                case "fatal_for_credential":
                    console.warn(
                        `[AnswerGeneration] Key #${attempt.credentialIndex + 1} ${result.kind}, skipping its remaining models`
                    );
                    abandoned.add(attempt.credentialIndex);
                    break;
                case "retriable":
                    if (result.kind === "failed") {
                        console.error(
                            `[AnswerGeneration] Key #${attempt.credentialIndex + 1} model ${attempt.model} failed:`,
                            result.error
                        );
                    } else {
                        console.warn(`[AnswerGeneration] Empty reply from ${attempt.model}, trying next model`);
                    }
                    break;
            }
        }
        return null;
    }

    private static judge(result: ChatCompletionResult): AttemptVerdict {
        switch (result.kind) {
            case "ok":
                return result.text ? "success" : "retriable";
            case "rate_limited":
            case "unauthorized":
                return "fatal_for_credential";
            case "failed":
                return "retriable";
        }
    }

    /** Prior turn text for retrieval when the caller refers back ("how much is it"). */
    private referenceHint(bare: string, history: readonly ConversationTurn[]): string | undefined {
        const last = history[history.length - 1];
        if (!last || !containsAnyPhrase(bare, this.phrases.referentialWords)) return undefined;
        return `${last.user} ${last.agent}`;
    }

    /** True when the utterance is one or more of `phrases` plus filler words and nothing else. */
    private consistsOnlyOf(bare: string, phrases: readonly string[]): boolean {
        if (!bare || !containsAnyPhrase(bare, phrases)) return false;
        let rest = bare;
        // Longest first so "thank you" goes before "you"-like fragments
        for (const phrase of [...phrases, ...this.phrases.filler].sort((a, b) => b.length - a.length)) {
            rest = rest.replace(phrasePattern(phrase, "g"), " ");
        }
        return rest.trim() === "";
    }

    private systemPrompt(context: string): string {
        const { institution, facts } = this.factSheet;
        return [
            `You are the official voice assistant for ${institution}. You answer callers by phone.`,
            "",
            "FACTS (always true, never contradict them):",
            ...facts.map((fact) => `- ${fact}`),
            "",
            "STRICT RULES:",
            "- Answer ONLY from the FACTS and CONTEXT. Never invent or add information.",
            `- If a complex question is not answered there, say "${NO_CONTEXT_REPLY}"`,
            '- For a yes/no question not answered there, say "No" or "I don\'t have that information." Never guess "Yes".',
            `- If the caller says you are wrong or challenges you, respond "${CHALLENGE_REPLY}" and keep your answer.`,
            '- State figures yourself. Never tell the caller to check a file or visit the website.',
            "- Say amounts in lakh and thousand (for example, 1 lakh 48 thousand rupees).",
            "- When the caller gives Matric, FSC and Entry Test marks, calculate the aggregate with the formula from FACTS and give only the number.",
            "- Keep responses to 1-3 short sentences, conversational and natural for speech.",
            "",
            "CONTEXT:",
            context,
        ].join("\n");
    }
}
