/**
 * Raised by a chat platform when it refuses to render a reply as markdown.
 */
export class ReplyFormatRejectedError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, { cause: options?.cause });
        this.name = "ReplyFormatRejectedError";
    }
}

export type UploadErrorKind = "too_large" | "download" | "extract";

/**
 * Error raised while accepting a document upload into a sandbox.
 * Expects: kind selects the user-facing text.
 */
export class UploadError extends Error {
    readonly kind: UploadErrorKind;

    constructor(kind: UploadErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, { cause: options?.cause });
        this.name = "UploadError";
        this.kind = kind;
    }
}
