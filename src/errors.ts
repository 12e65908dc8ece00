export class ChecklistError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * A listing page could not be fetched: transport failure (status 0) or a
 * non-2xx response.
 */
export class FetchError extends ChecklistError {
    constructor(
        readonly url: string,
        readonly status: number,
        reason: string,
        options?: { cause?: unknown }
    ) {
        super(`Failed to fetch ${url}: ${reason}`, options);
    }
}

export class ParseError extends ChecklistError {
    constructor(readonly url: string, reason: string, options?: { cause?: unknown }) {
        super(`Failed to parse ${url}: ${reason}`, options);
    }
}

export class InputValidationError extends ChecklistError {
    constructor(readonly issues: string[]) {
        super(`Invalid input: ${issues.join('; ')}`);
    }
}

export function isCrawlError(error: unknown): error is FetchError | ParseError {
    return error instanceof FetchError || error instanceof ParseError;
}
