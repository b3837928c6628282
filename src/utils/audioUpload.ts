// src/utils/audioUpload.ts
import type { AudioUpload } from "../business/models/TurnModel";

type UploadedFile = { buffer: Buffer; originalname?: string; mimetype?: string };

const CONTENT_TYPES: Record<string, string> = {
    wav: "audio/wav",
    mp4: "audio/mp4",
    ogg: "audio/ogg",
    webm: "audio/webm",
};

/** Container format from filename or content type; browsers that say nothing record webm. */
export function detectAudioExtension(filename: string, contentType: string): string {
    const name = filename.toLowerCase();
    const type = contentType.toLowerCase();
    if (name.endsWith(".wav") || type.includes("wav")) return "wav";
    if (name.endsWith(".mp4") || name.endsWith(".m4a") || type.includes("mp4") || type.includes("m4a")) return "mp4";
    if (name.endsWith(".ogg") || type.includes("ogg")) return "ogg";
    return "webm";
}

export function toAudioUpload(file: UploadedFile): AudioUpload {
    const ext = detectAudioExtension(file.originalname ?? "", file.mimetype ?? "");
    return { buffer: file.buffer, filename: `audio.${ext}`, mimeType: CONTENT_TYPES[ext] };
}
