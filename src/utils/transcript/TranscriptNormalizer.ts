// src/utils/transcript/TranscriptNormalizer.ts
import type { MisheardCorrection } from "../../config/knowledge";

const escapeRegex = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Builds a matcher for a lower-case phrase that only hits on whole words, so
 * "fee" does not fire inside "coffee".
 */
export const phrasePattern = (phrase: string, flags = ""): RegExp =>
    new RegExp(`(?<![a-z0-9])${escapeRegex(phrase)}(?![a-z0-9])`, flags);

export const containsPhrase = (text: string, phrase: string): boolean => phrasePattern(phrase).test(text);

export const containsAnyPhrase = (text: string, phrases: readonly string[]): boolean =>
    phrases.some((phrase) => containsPhrase(text, phrase));

export class TranscriptNormalizer {
    private readonly corrections: { pattern: RegExp; meant: string }[];

    constructor(corrections: readonly MisheardCorrection[]) {
        this.corrections = corrections.map((c) => ({ pattern: phrasePattern(c.heard, "g"), meant: c.meant }));
    }

    /** Lower-cases, collapses whitespace and fixes known transcription homophones. */
    public normalize(text: string): string {
        let out = (text || "").toLowerCase().replace(/\s+/g, " ").trim();
        for (const { pattern, meant } of this.corrections) {
            out = out.replace(pattern, meant);
        }
        return out;
    }

    /** Normalized text with punctuation stripped, for whole-utterance phrase checks. */
    public static bare(text: string): string {
        return text
            .toLowerCase()
            .replace(/[^a-z0-9'\s]/g, " ")
            .replace(/\s+/g, " ")
            .trim();
    }
}
