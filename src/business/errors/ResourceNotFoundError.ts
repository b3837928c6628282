export class ResourceNotFoundError extends Error {
    constructor(
        message = "Resource not found.",
        public readonly statusCode: number = 404
    ) {
        super(message);
        this.name = "ResourceNotFoundError";
    }
}
