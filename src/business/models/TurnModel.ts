export type AudioUpload = {
    buffer: Buffer;
    mimeType: string;
    filename: string;
};

export type TurnEvent =
    | { type: "transcript"; text: string }
    | { type: "sentence"; text: string; audio_url: string }
    | { type: "done" }
    | { type: "error"; text: string };

export type TurnResult =
    | { kind: "transcription_empty"; transcript: string; message: string }
    | {
          kind: "reply";
          transcript: string;
          reply: string;
          audioUrl: string;
          escalated: boolean;
      };

export type CallStart = {
    sessionId: string;
    roomName: string;
    roomToken: string | null;
    greetingAudioUrl: string;
};
