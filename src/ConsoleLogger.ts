
import { ILogger } from "./interfaces/ILogger";
import { SecretRedactor } from "./utils/SecretRedactor";

export type ConsoleLoggerOptions = {
    /** Send log() to stderr, keeping stdout for machine-readable output. */
    logToStderr?: boolean;
};

export class ConsoleLogger implements ILogger {
    constructor(private options: ConsoleLoggerOptions = {}) { }

    log(message: string): void {
        const redacted = SecretRedactor.redact(message);
        if (this.options.logToStderr) {
            console.error(redacted);
        } else {
            console.log(redacted);
        }
    }

    warn(message: string, error?: unknown): void {
        const redactedMessage = SecretRedactor.redact(message);
        if (error) {
            console.warn(redactedMessage, SecretRedactor.redact(describeError(error)));
        } else {
            console.warn(redactedMessage);
        }
    }

    error(message: string, error?: unknown): void {
        const redactedMessage = SecretRedactor.redact(message);
        if (error) {
            console.error(redactedMessage, SecretRedactor.redact(describeError(error)));
        } else {
            console.error(redactedMessage);
        }
    }
}

export function describeError(error: unknown): string {
    if (typeof error === "string") return error;
    if (error instanceof Error) return error.stack || error.message;
    return JSON.stringify(error);
}
