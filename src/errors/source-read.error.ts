/** A source file or payload could not be turned into contact rows. */
export class SourceReadError extends Error {
    readonly status = 422;

    constructor(message: string, readonly source?: string) {
        super(message);
        this.name = "SourceReadError";
    }
}
