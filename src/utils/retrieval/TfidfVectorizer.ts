// src/utils/retrieval/TfidfVectorizer.ts
import { IndexBuildError } from "../../business/errors/IndexBuildError";

export type SparseVector = ReadonlyMap<string, number>;

export type TfidfOptions = {
    stopWords: ReadonlySet<string>;
    /** Keep only the N most frequent terms across the corpus. */
    maxFeatures?: number;
    /** Drop terms that occur in more than this fraction of documents. */
    maxDocFrequency?: number;
};

const TOKEN_PATTERN = /\b\w\w+\b/g;

/**
 * Term-frequency / inverse-document-frequency model fitted once over the
 * chunk corpus. Uses smoothed idf (ln((1 + n) / (1 + df)) + 1) and
 * L2-normalised vectors so cosine similarity reduces to a dot product.
 */
export class TfidfVectorizer {
    private constructor(
        private readonly idf: ReadonlyMap<string, number>,
        private readonly stopWords: ReadonlySet<string>
    ) {}

    public static tokenize(text: string, stopWords: ReadonlySet<string>): string[] {
        const tokens = text.toLowerCase().match(TOKEN_PATTERN) ?? [];
        return tokens.filter((token) => !stopWords.has(token));
    }

    public static fit(documents: readonly string[], options: TfidfOptions): TfidfVectorizer {
        const n = documents.length;
        if (n === 0) throw new IndexBuildError("No chunks to fit the vectorizer on.");

        const docFrequency = new Map<string, number>();
        const corpusFrequency = new Map<string, number>();
        for (const doc of documents) {
            const tokens = TfidfVectorizer.tokenize(doc, options.stopWords);
            for (const token of tokens) corpusFrequency.set(token, (corpusFrequency.get(token) ?? 0) + 1);
            for (const token of new Set(tokens)) docFrequency.set(token, (docFrequency.get(token) ?? 0) + 1);
        }

        const maxDocCount = (options.maxDocFrequency ?? 1) * n;
        let terms = [...docFrequency.keys()].filter((term) => (docFrequency.get(term) ?? 0) <= maxDocCount);

        if (options.maxFeatures && terms.length > options.maxFeatures) {
            terms = terms
                .sort((a, b) => (corpusFrequency.get(b) ?? 0) - (corpusFrequency.get(a) ?? 0) || a.localeCompare(b))
                .slice(0, options.maxFeatures);
        }

        if (!terms.length) {
            throw new IndexBuildError("After pruning, no terms remain. Add more or more varied documents.");
        }

        const idf = new Map<string, number>();
        for (const term of terms) {
            idf.set(term, Math.log((1 + n) / (1 + (docFrequency.get(term) ?? 0))) + 1);
        }
        return new TfidfVectorizer(idf, options.stopWords);
    }

    public get vocabularySize(): number {
        return this.idf.size;
    }

    public transform(text: string): SparseVector {
        const counts = new Map<string, number>();
        for (const token of TfidfVectorizer.tokenize(text, this.stopWords)) {
            if (this.idf.has(token)) counts.set(token, (counts.get(token) ?? 0) + 1);
        }

        const weighted = new Map<string, number>();
        let norm = 0;
        for (const [term, count] of counts) {
            const weight = count * (this.idf.get(term) ?? 0);
            weighted.set(term, weight);
            norm += weight * weight;
        }
        norm = Math.sqrt(norm);
        if (norm === 0) return weighted;

        for (const [term, weight] of weighted) weighted.set(term, weight / norm);
        return weighted;
    }
}

export const cosineSimilarity = (a: SparseVector, b: SparseVector): number => {
    const [small, large] = a.size <= b.size ? [a, b] : [b, a];
    let dot = 0;
    for (const [term, weight] of small) {
        const other = large.get(term);
        if (other !== undefined) dot += weight * other;
    }
    return dot;
};
