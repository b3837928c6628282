export type AnswerOutcome =
    | "answered"
    | "acknowledged"
    | "farewell"
    | "retrieval_empty"
    | "generation_exhausted";

export type AnswerResult = {
    reply: string;
    escalated: boolean;
    outcome: AnswerOutcome;
};
