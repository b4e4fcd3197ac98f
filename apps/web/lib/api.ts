import { z } from "zod";
import { ScanApiError } from "./errors";
import type { ScanPayload, ScanResult } from "./types";

const findingSchema = z.object({
    id: z.union([z.string(), z.number().transform(String)]).optional().catch(undefined),
    severity: z.string().optional().catch(undefined),
    title: z.string().optional().catch(undefined),
    details: z.string().optional().catch(undefined),
    evidence: z.unknown().optional(),
});

// Integer strings such as "42" are read as numbers.
const scoreSchema = z.union([
    z.number().finite(),
    z.string().trim().regex(/^[+-]?\d+$/).transform(Number),
]);

const scanResultSchema = z.object({
    score: scoreSchema.optional().transform((value) => Math.trunc(value ?? 0)),
    findings: z.array(findingSchema),
});

/**
 * Validate a /scan or /apply response body. Anything other than an object
 * with a findings array is a malformed response.
 */
export function parseScanResult(body: unknown): ScanResult {
    const parsed = scanResultSchema.safeParse(body);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
        throw new ScanApiError("MALFORMED", `Malformed response${where}: ${issue?.message ?? "invalid body"}`);
    }
    return {
        score: parsed.data.score,
        findings: parsed.data.findings.map(({ id, severity, title, details, evidence }) => ({
            id,
            severity,
            title,
            details,
            evidence,
        })),
    };
}

async function errorFromResponse(res: Response): Promise<ScanApiError> {
    let detail: string | null = null;
    try {
        const body: unknown = await res.json();
        if (typeof body === "object" && body !== null && "detail" in body && typeof body.detail === "string") {
            detail = body.detail;
        }
    } catch {
        // Non-JSON error bodies fall back to the status line.
    }
    const statusLine = `HTTP ${res.status}${res.statusText ? ` ${res.statusText}` : ""}`;
    return new ScanApiError("HTTP", detail ?? statusLine, { status: res.status });
}

/**
 * fetch() with an upper bound on how long the request may take, body read
 * included. A timeout is reported as a ScanApiError like any other failure.
 */
async function fetchWithTimeout<T>(
    url: string,
    init: RequestInit,
    timeoutMs: number,
    readBody: (res: Response) => Promise<T>
): Promise<T> {
    const controller = new AbortController();
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<never>((_resolve, reject) => {
        timeoutId = setTimeout(() => {
            controller.abort();
            reject(new ScanApiError("TIMEOUT", `Request timed out after ${Math.round(timeoutMs / 1000)}s`));
        }, timeoutMs);
    });
    // The race below may settle first; keep a late timeout rejection handled.
    timedOut.catch(() => undefined);

    const exchange = async (): Promise<T> => {
        let res: Response;
        try {
            res = await fetch(url, { ...init, signal: controller.signal });
        } catch (err) {
            if (controller.signal.aborted) {
                throw new ScanApiError("TIMEOUT", `Request timed out after ${Math.round(timeoutMs / 1000)}s`, { cause: err });
            }
            const reason = err instanceof Error ? err.message : String(err);
            throw new ScanApiError("NETWORK", `Could not reach backend: ${reason}`, { cause: err });
        }
        if (!res.ok) {
            throw await errorFromResponse(res);
        }
        return readBody(res);
    };

    try {
        return await Promise.race([exchange(), timedOut]);
    } finally {
        clearTimeout(timeoutId);
    }
}

async function readJson(res: Response): Promise<unknown> {
    try {
        return await res.json();
    } catch (err) {
        throw new ScanApiError("MALFORMED", "Malformed response: body is not JSON", { cause: err });
    }
}

async function readBlob(res: Response): Promise<Blob> {
    try {
        return await res.blob();
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ScanApiError("NETWORK", `Report download interrupted: ${reason}`, { cause: err });
    }
}

/**
 * Submit a specimen for scanning.
 *
 * @param baseUrl - backend base URL without a trailing slash
 */
export async function runScan(baseUrl: string, payload: ScanPayload, timeoutMs: number): Promise<ScanResult> {
    const body = await fetchWithTimeout(
        `${baseUrl}/scan`,
        {
            method: "POST",
            headers: { "Content-Type": "application/json" },
            body: JSON.stringify(payload),
        },
        timeoutMs,
        readJson
    );
    return parseScanResult(body);
}

/**
 * Ask the backend to remediate the given findings. The response is a complete
 * replacement result, not a delta.
 */
export async function applyFixes(baseUrl: string, ids: string[], timeoutMs: number): Promise<ScanResult> {
    const body = await fetchWithTimeout(
        `${baseUrl}/apply`,
        {
            method: "POST",
            headers: { "Content-Type": "application/json" },
            body: JSON.stringify({ ids }),
        },
        timeoutMs,
        readJson
    );
    return parseScanResult(body);
}

export function fetchReport(baseUrl: string, timeoutMs: number): Promise<Blob> {
    return fetchWithTimeout(`${baseUrl}/report.pdf`, { method: "GET" }, timeoutMs, readBlob);
}
