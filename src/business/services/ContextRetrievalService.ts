// src/business/services/ContextRetrievalService.ts
import fs from "fs/promises";
import path from "path";
import { inject, injectable } from "tsyringe";
import type { Config } from "../../config/config";
import type { RetrievalRules } from "../../config/knowledge";
import { chunkText } from "../../utils/retrieval/chunkText";
import { cosineSimilarity, TfidfVectorizer } from "../../utils/retrieval/TfidfVectorizer";
import { containsAnyPhrase, TranscriptNormalizer } from "../../utils/transcript/TranscriptNormalizer";
import { ContextIndexModel, SourceDocument } from "../models/ContextIndexModel";
import { DocumentChunkModel } from "../models/DocumentChunkModel";

export const CHUNK_DELIMITER = "\n\n---\n\n";
export const TRUNCATION_MARKER = "\n...[truncated]";
const MIN_TRUNCATED_CHARS = 100;
const MAX_FEATURES = 5000;
const MAX_DOC_FREQUENCY = 0.95;

export type RankedChunk = {
    sourceName: string;
    score: number;
};

export type AssembledContext = {
    text: string;
    forcedSources: string[];
    rankedChunks: RankedChunk[];
    truncated: boolean;
};

type Budget = { used: number; exhausted: boolean; truncated: boolean };

@injectable()
export class ContextRetrievalService {
    // Swapped wholesale on rebuild; readers keep whatever reference they started with.
    private index: ContextIndexModel | null = null;
    private readonly normalizer: TranscriptNormalizer;

    constructor(
        @inject("Config") private readonly config: Config,
        @inject("RetrievalRules") private readonly rules: RetrievalRules,
        @inject("StopWords") private readonly stopWords: ReadonlySet<string>
    ) {
        this.normalizer = new TranscriptNormalizer(rules.corrections);
    }

    public isReady(): boolean {
        return this.index !== null;
    }

    public getIndex(): ContextIndexModel | null {
        return this.index;
    }

    /**
     * Load every source document from the knowledge directory, build a fresh
     * index and swap it in. Leaves the service without an index (retrieve
     * returns "") when the directory holds nothing usable.
     */
    public async initialize(): Promise<void> {
        const documents = await this.loadDocuments();
        if (!documents.length) {
            console.warn(`[ContextRetrieval] No documents found in ${this.config.knowledgeDir}`);
            return;
        }
        this.rebuild(documents);
    }

    public rebuild(documents: readonly SourceDocument[]): ContextIndexModel {
        const next = this.buildIndex(documents);
        this.index = next;
        console.log(
            `[ContextRetrieval] Index ready: ${next.chunks.length} chunks from ${next.sourceNames.length} documents, ` +
                `${next.vectorizer.vocabularySize} terms`
        );
        return next;
    }

    /** Chunk and vectorize the given documents. Throws IndexBuildError when nothing can be fitted. */
    public buildIndex(documents: readonly SourceDocument[]): ContextIndexModel {
        const pieces: { sourceName: string; text: string }[] = [];
        for (const doc of documents) {
            const maxLen = doc.maxChunkChars ?? this.config.chunkSize;
            for (const text of chunkText(doc.text, maxLen, this.config.chunkOverlap)) {
                pieces.push({ sourceName: doc.name, text });
            }
        }

        const vectorizer = TfidfVectorizer.fit(
            pieces.map((p) => p.text),
            { stopWords: this.stopWords, maxFeatures: MAX_FEATURES, maxDocFrequency: MAX_DOC_FREQUENCY }
        );
        const chunks = pieces.map((p) => new DocumentChunkModel(p.sourceName, p.text, vectorizer.transform(p.text)));
        return new ContextIndexModel(chunks, documents, vectorizer);
    }

    public async loadDocuments(dir = this.config.knowledgeDir): Promise<SourceDocument[]> {
        let entries: string[];
        try {
            entries = (await fs.readdir(dir)).sort();
        } catch (error) {
            console.warn(`[ContextRetrieval] Knowledge directory ${dir} is not readable`, error);
            return [];
        }

        const documents: SourceDocument[] = [];
        for (const file of entries) {
            const fullPath = path.join(dir, file);
            try {
                const stat = await fs.stat(fullPath);
                if (!stat.isFile()) continue;

                if (file.endsWith(".txt")) {
                    const text = await fs.readFile(fullPath, "utf8");
                    if (text.trim()) documents.push({ name: file, text });
                } else if (file.endsWith(".json")) {
                    const parsed: unknown = JSON.parse(await fs.readFile(fullPath, "utf8"));
                    const text = JSON.stringify(parsed, null, 2);
                    if (text.trim()) documents.push({ name: file, text, maxChunkChars: this.config.jsonChunkSize });
                } else {
                    continue;
                }
                console.log(`[ContextRetrieval] Loaded: ${file}`);
            } catch (error) {
                console.error(`[ContextRetrieval] Error loading ${file}:`, error);
            }
        }
        return documents;
    }

    /** Context text for the language model; never throws, "" when no index exists. */
    public retrieve(query: string, conversationHint?: string): string {
        return this.assemble(query, conversationHint).text;
    }

    public assemble(query: string, conversationHint?: string): AssembledContext {
        const empty: AssembledContext = { text: "", forcedSources: [], rankedChunks: [], truncated: false };
        const index = this.index;
        if (!index) return empty;

        try {
            const combined = conversationHint ? `${conversationHint} ${query}` : query;
            const normalized = this.normalizer.normalize(combined);

            const parts: string[] = [];
            const budget: Budget = { used: 0, exhausted: false, truncated: false };

            const forcedSources = this.resolveForcedSources(normalized, index);
            for (const name of forcedSources) {
                const text = index.sourceText(name);
                if (text === undefined) continue;
                this.appendWithinBudget(parts, `[${name}]\n${text}`, budget);
                if (budget.exhausted) break;
            }

            const rankedChunks: RankedChunk[] = [];
            if (!budget.exhausted) {
                const covered = new Set(forcedSources);
                const queryVector = index.vectorizer.transform(this.expandForRanking(normalized));
                const scored = index.chunks
                    .map((chunk, position) => ({ chunk, position, score: cosineSimilarity(queryVector, chunk.vector) }))
                    .sort((a, b) => b.score - a.score || a.position - b.position)
                    .slice(0, this.config.retrievalTopK);

                for (const { chunk, score } of scored) {
                    if (score <= this.config.retrievalMinScore) continue;
                    if (covered.has(chunk.sourceName)) continue;
                    if (this.appendWithinBudget(parts, `[${chunk.sourceName}]\n${chunk.text}`, budget)) {
                        rankedChunks.push({ sourceName: chunk.sourceName, score });
                    }
                    if (budget.exhausted) break;
                }
            }

            return {
                text: parts.join(CHUNK_DELIMITER),
                forcedSources,
                rankedChunks,
                truncated: budget.truncated,
            };
        } catch (error) {
            console.error("[ContextRetrieval] Error assembling context:", error);
            return empty;
        }
    }

    /** Adds topic synonyms so ranking copes with short, noisy spoken queries. */
    public expandForRanking(normalizedQuery: string): string {
        const extra: string[] = [];
        for (const hint of this.rules.synonymHints) {
            if (!containsAnyPhrase(normalizedQuery, hint.whenAny)) continue;
            if (hint.alsoAny && !containsAnyPhrase(normalizedQuery, hint.alsoAny)) continue;
            extra.push(hint.append);
        }
        return extra.length ? `${normalizedQuery} ${extra.join(" ")}` : normalizedQuery;
    }

    /**
     * Documents injected in full regardless of similarity: every matching rule
     * contributes its documents in rule order. Without a match (or when none of
     * the matched documents is indexed) the baseline set is used instead.
     */
    public resolveForcedSources(normalizedQuery: string, index: ContextIndexModel): string[] {
        const known = new Set(index.sourceNames);
        const picked: string[] = [];
        const add = (name: string) => {
            if (known.has(name) && !picked.includes(name)) picked.push(name);
        };

        for (const rule of this.rules.forcedRules) {
            if (containsAnyPhrase(normalizedQuery, rule.keywords)) rule.documents.forEach(add);
        }
        if (picked.length) return picked;

        this.rules.baselineDocuments.forEach(add);
        if (!picked.length && index.sourceNames.length) picked.push(index.sourceNames[0]);
        return picked;
    }

    /** Returns whether any part of the block made it in. */
    private appendWithinBudget(parts: string[], block: string, budget: Budget): boolean {
        const max = this.config.maxContextChars;
        const separator = parts.length ? CHUNK_DELIMITER.length : 0;
        if (budget.used + separator + block.length <= max) {
            parts.push(block);
            budget.used += separator + block.length;
            return true;
        }

        const remain = max - budget.used - separator - TRUNCATION_MARKER.length;
        if (remain >= MIN_TRUNCATED_CHARS) {
            parts.push(block.slice(0, remain) + TRUNCATION_MARKER);
            budget.used = max;
            budget.truncated = true;
            budget.exhausted = true;
            return true;
        }
        budget.exhausted = true;
        return false;
    }
}
