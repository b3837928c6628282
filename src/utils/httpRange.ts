// src/utils/httpRange.ts
export type ByteRange = { start: number; end: number };

/**
 * Single-range `bytes=` parser. Returns null when there is no usable Range
 * header (the whole payload is served) and "unsatisfiable" for a range that
 * lies outside the payload. Multi-range requests are served whole.
 */
export function parseByteRange(header: string | undefined, size: number): ByteRange | "unsatisfiable" | null {
    if (!header) return null;
    const match = /^bytes=(\d*)-(\d*)$/.exec(header.trim());
    if (!match) return null;

    const [, rawStart, rawEnd] = match;
    if (rawStart === "" && rawEnd === "") return null;

    if (rawStart === "") {
        // suffix form: last N bytes
        const suffix = Number(rawEnd);
        if (suffix === 0 || size === 0) return "unsatisfiable";
        return { start: Math.max(size - suffix, 0), end: size - 1 };
    }

    const start = Number(rawStart);
    const end = rawEnd === "" ? size - 1 : Math.min(Number(rawEnd), size - 1);
    if (start >= size || start > end) return "unsatisfiable";
    return { start, end };
}
