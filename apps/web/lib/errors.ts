export type ScanApiErrorCode = "TIMEOUT" | "HTTP" | "NETWORK" | "MALFORMED";

export class ScanApiError extends Error {
    readonly code: ScanApiErrorCode;
    readonly status?: number;

    constructor(
        code: ScanApiErrorCode,
        message: string,
        options: { status?: number; cause?: unknown } = {}
    ) {
        super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
        this.name = "ScanApiError";
        this.code = code;
        this.status = options.status;
    }
}

/** One-line text for the error banner. */
export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
