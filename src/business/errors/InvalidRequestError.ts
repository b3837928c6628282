export class InvalidRequestError extends Error {
    constructor(
        message = "Invalid request",
        public readonly statusCode: number = 400
    ) {
        super(message);
        this.name = "InvalidRequestError";
    }
}
