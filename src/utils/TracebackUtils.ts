const TRACEBACK_HEADER = /Traceback \(most recent call last\):[\r\n]+\s+File "/m;

/**
 * Cuts a Python traceback out of the output a test captured. Output without a
 * recognisable traceback is returned whole (trimmed); empty output gives
 * undefined.
 */
export function extractTraceback(text: string | undefined): string | undefined {
    if (!text || !text.trim()) {
        return undefined;
    }

    const match = TRACEBACK_HEADER.exec(text);
    if (match) {
        return text.slice(match.index).trim();
    }

    const start = text.indexOf("Traceback");
    if (start !== -1) {
        const lines = text.slice(start).split("\n");
        if (lines.length > 1 && lines[1].includes("File ")) {
            return text.slice(start).trim();
        }
    }

    return text.trim();
}
