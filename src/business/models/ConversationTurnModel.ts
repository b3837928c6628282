export type ConversationTurn = {
    user: string;
    agent: string;
};
