export class ParseError extends Error {
    constructor(message: string, public readonly input: string) {
        super(message);
        this.name = "ParseError";
    }
}
