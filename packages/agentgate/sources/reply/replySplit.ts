/**
 * Splits reply text into chunks of at most maxLength characters.
 * Expects: maxLength > 0. A newline at or before maxLength is preferred as the cut point unless it falls
 * inside the first 40% of the window; a newline used as the cut is dropped.
 */
export function replySplit(text: string, maxLength: number): string[] {
    if (maxLength <= 0) {
        throw new Error("maxLength must be greater than 0");
    }
    if (text.length <= maxLength) {
        return [text];
    }

    const chunks: string[] = [];
    let remaining = text;

    while (remaining.length > maxLength) {
        const cutIndex = findBreakIndex(remaining, maxLength);
        chunks.push(remaining.slice(0, cutIndex));
        remaining = remaining.slice(cutIndex);
        if (remaining.startsWith("\n")) {
            remaining = remaining.slice(1);
        }
    }

    if (remaining.length > 0) {
        chunks.push(remaining);
    }
    return chunks;
}

function findBreakIndex(text: string, maxLength: number): number {
    const index = text.lastIndexOf("\n", maxLength);
    if (index === -1 || index < Math.floor(maxLength * 0.4)) {
        return maxLength;
    }
    return index;
}
