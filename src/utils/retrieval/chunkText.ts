// src/utils/retrieval/chunkText.ts

/**
 * Split a document into chunks of at most `maxLen` characters. Paragraphs
 * (blank-line separated) are packed greedily; a paragraph that is longer than
 * `maxLen` on its own is sliced with `overlap` characters shared between
 * neighbouring slices so no boundary loses its surrounding context.
 */
export function chunkText(text: string, maxLen: number, overlap: number): string[] {
    const trimmed = text.trim();
    if (!trimmed) return [];
    if (trimmed.length <= maxLen) return [trimmed];

    const stride = Math.max(1, maxLen - overlap);
    const chunks: string[] = [];
    let current = "";

    for (const paragraph of trimmed.split("\n\n")) {
        if (current.length + paragraph.length + 2 <= maxLen) {
            current = current ? `${current}\n\n${paragraph}`.trim() : paragraph;
            continue;
        }

        if (current) chunks.push(current);

        if (paragraph.length > maxLen) {
            for (let i = 0; i < paragraph.length; i += stride) {
                const slice = paragraph.slice(i, i + maxLen).trim();
                if (slice) chunks.push(slice);
            }
            current = "";
        } else {
            current = paragraph;
        }
    }

    if (current.trim()) chunks.push(current.trim());
    return chunks;
}
