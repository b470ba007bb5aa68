/**
 * Raised when text entering the core cannot be parsed into a typed identifier.
 */
export class MalformedIdentifierError extends Error {
    readonly text: string;
    readonly reason: string;

    constructor(text: string, reason: string) {
        super(`Malformed identifier "${text}": ${reason}`);
        this.name = "MalformedIdentifierError";
        this.text = text;
        this.reason = reason;
    }
}
