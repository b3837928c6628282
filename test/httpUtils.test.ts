import { detectAudioExtension, toAudioUpload } from "../src/utils/audioUpload";
import { parseByteRange } from "../src/utils/httpRange";

describe("parseByteRange", () => {
    it("ignores a missing or malformed header", () => {
        expect(parseByteRange(undefined, 100)).toBeNull();
        expect(parseByteRange("items=0-10", 100)).toBeNull();
        expect(parseByteRange("bytes=0-1,5-6", 100)).toBeNull();
    });

    it("reads an explicit range and clamps its end", () => {
        expect(parseByteRange("bytes=0-1", 100)).toEqual({ start: 0, end: 1 });
        expect(parseByteRange("bytes=90-500", 100)).toEqual({ start: 90, end: 99 });
    });

    it("reads open-ended and suffix ranges", () => {
        expect(parseByteRange("bytes=40-", 100)).toEqual({ start: 40, end: 99 });
        expect(parseByteRange("bytes=-10", 100)).toEqual({ start: 90, end: 99 });
        expect(parseByteRange("bytes=-500", 100)).toEqual({ start: 0, end: 99 });
    });

    it("rejects ranges outside the payload", () => {
        expect(parseByteRange("bytes=100-", 100)).toBe("unsatisfiable");
        expect(parseByteRange("bytes=50-10", 100)).toBe("unsatisfiable");
        expect(parseByteRange("bytes=-0", 100)).toBe("unsatisfiable");
    });
});

describe("audio uploads", () => {
    it.each([
        ["clip.wav", "", "wav"],
        ["", "audio/wav", "wav"],
        ["voice.m4a", "", "mp4"],
        ["", "audio/mp4", "mp4"],
        ["note.ogg", "", "ogg"],
        ["", "audio/ogg; codecs=opus", "ogg"],
        ["blob", "audio/webm;codecs=opus", "webm"],
        ["", "", "webm"],
    ])("detects %s / %s as %s", (filename, contentType, expected) => {
        expect(detectAudioExtension(filename, contentType)).toBe(expected);
    });

    it("names the upload after its detected format", () => {
        const buffer = Buffer.from("RIFF");

        expect(toAudioUpload({ buffer, originalname: "Recording.WAV", mimetype: "application/octet-stream" })).toEqual({
            buffer,
            filename: "audio.wav",
            mimeType: "audio/wav",
        });
    });
});
