// src/utils/tts/SentenceSplitter.ts
const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;

export class SentenceSplitter {
    /**
     * Splits a reply at terminal punctuation followed by whitespace. Text with
     * no boundary comes back as a single sentence; blank pieces are dropped.
     */
    public static split(text: string): string[] {
        return text
            .split(SENTENCE_BOUNDARY)
            .map((sentence) => sentence.trim())
            .filter((sentence) => sentence !== "");
    }
}
