/** How a synthesis run ended; returned by the streaming sequence once drained. */
export type SynthesisEnd =
    | { kind: "completed"; chunks: number; bytes: number }
    | { kind: "timeout"; chunks: number }
    | { kind: "failure"; chunks: number; error: unknown }
    | { kind: "cancelled" };

export type SynthesisOutcome =
    | { kind: "audio"; audio: Buffer }
    | { kind: "timeout" }
    | { kind: "failure" };
