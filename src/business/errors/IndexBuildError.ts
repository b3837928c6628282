export class IndexBuildError extends Error {
    constructor(message = "Context index could not be built.") {
        super(message);
        this.name = "IndexBuildError";
    }
}
