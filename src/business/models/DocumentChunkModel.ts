import type { SparseVector } from "../../utils/retrieval/TfidfVectorizer";

/** Unit of retrievable text. Immutable once the index is built. */
export class DocumentChunkModel {
    constructor(
        private readonly _sourceName: string,
        private readonly _text: string,
        private readonly _vector: SparseVector
    ) {}

    public get sourceName(): string {
        return this._sourceName;
    }

    public get text(): string {
        return this._text;
    }

    public get vector(): SparseVector {
        return this._vector;
    }
}
