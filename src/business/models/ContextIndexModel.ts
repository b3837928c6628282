import type { TfidfVectorizer } from "../../utils/retrieval/TfidfVectorizer";
import { DocumentChunkModel } from "./DocumentChunkModel";

export type SourceDocument = {
    name: string;
    text: string;
    /** Overrides the configured chunk size (JSON sources use a larger one). */
    maxChunkChars?: number;
};

/**
 * All chunks plus the vectorizer fitted over them. Never mutated; a rebuild
 * produces a new instance.
 */
export class ContextIndexModel {
    private readonly _sources: ReadonlyMap<string, string>;

    constructor(
        private readonly _chunks: readonly DocumentChunkModel[],
        sources: readonly SourceDocument[],
        private readonly _vectorizer: TfidfVectorizer
    ) {
        this._sources = new Map(sources.map((source) => [source.name, source.text.trim()]));
    }

    public get chunks(): readonly DocumentChunkModel[] {
        return this._chunks;
    }

    public get vectorizer(): TfidfVectorizer {
        return this._vectorizer;
    }

    public get sourceNames(): string[] {
        return [...this._sources.keys()];
    }

    /** Full (unchunked) text of a source document, for forced injection. */
    public sourceText(name: string): string | undefined {
        return this._sources.get(name);
    }
}
