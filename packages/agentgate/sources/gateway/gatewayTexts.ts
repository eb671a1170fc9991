export const GATEWAY_TEXT = {
    accessDenied: "Access denied",
    fileTooLarge: "File is too large",
    downloadFailed: "Failed to download the file",
    processFailed: "Failed to process the file",
    invalidMarkdown: "Error: invalid Markdown",
    documentDefaultRequest: "Review the logs and identify the main errors and anomalies.",
    help: [
        "I pass this chat to the agent.",
        "Mention me in a group to analyze the last 30 messages, or write to me directly.",
        "Send a log file or an archive to unpack it into this chat's sandbox; the caption becomes the request."
    ].join("\n")
} as const;

export function gatewayErrorText(error: unknown): string {
    return `Error: ${error instanceof Error ? error.message : String(error)}`;
}

export function gatewayFileSavedText(uploadedFile: string, extracted: number): string {
    return extracted > 0 ? `File saved: ${uploadedFile}, extracted files: ${extracted}` : `File saved: ${uploadedFile}`;
}
