/**
 * Base class for the failures the CLI reports to the user as-is
 * (as opposed to programming errors, which are printed with a stack).
 */
export class ReportError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** The report could not be read from disk or downloaded. */
export class FetchError extends ReportError {
    constructor(
        message: string,
        public readonly source: string,
        public readonly statusCode?: number,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

/** The HTML did not look like a stestr/Tempest result page. */
export class ParseError extends ReportError {
    constructor(message: string, public readonly rowId?: string) {
        super(message);
    }
}

/** Bad command-line usage: unknown flag, invalid choice, wrong argument count. */
export class UsageError extends ReportError { }
