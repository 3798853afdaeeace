/**
 * Raised when an intent refers to a position that doesn't exist in the filtered view
 */
export class IndexError extends Error {
    override readonly name = "IndexError";

    constructor(readonly index: number, readonly size: number) {
        super(`Invalid index ${index}: filtered view contains ${size} item(s)`);
    }
}
