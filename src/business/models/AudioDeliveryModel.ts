export type ClientPlaybackClass = "streaming" | "buffering";

export type AudioDelivery =
    | { kind: "stream"; chunks: AsyncGenerator<Buffer, void, undefined> }
    | { kind: "buffer"; audio: Buffer; fromCache: boolean }
    | { kind: "not_found" }
    | { kind: "failed"; reason: "timeout" | "failure" };
