/**
 * Runtime configuration read from the environment at build time.
 * Only NEXT_PUBLIC_* variables reach the browser bundle.
 */

const DEFAULT_BACKEND_URL = "http://localhost:8000";

function readTimeout(raw: string | undefined, fallback: number): number {
    if (!raw) return fallback;
    const parsed = Number.parseInt(raw, 10);
    if (!Number.isFinite(parsed) || parsed <= 0) {
        console.warn(`Ignoring invalid timeout value "${raw}", using ${fallback}ms`);
        return fallback;
    }
    return parsed;
}

export interface ClientConfig {
    backendUrl: string;
    scanTimeoutMs: number;
    applyTimeoutMs: number;
    reportTimeoutMs: number;
}

export function loadClientConfig(env: Record<string, string | undefined> = {
    NEXT_PUBLIC_BACKEND_URL: process.env.NEXT_PUBLIC_BACKEND_URL,
    NEXT_PUBLIC_SCAN_TIMEOUT_MS: process.env.NEXT_PUBLIC_SCAN_TIMEOUT_MS,
    NEXT_PUBLIC_APPLY_TIMEOUT_MS: process.env.NEXT_PUBLIC_APPLY_TIMEOUT_MS,
    NEXT_PUBLIC_REPORT_TIMEOUT_MS: process.env.NEXT_PUBLIC_REPORT_TIMEOUT_MS,
}): ClientConfig {
    return {
        backendUrl: env.NEXT_PUBLIC_BACKEND_URL || DEFAULT_BACKEND_URL,
        scanTimeoutMs: readTimeout(env.NEXT_PUBLIC_SCAN_TIMEOUT_MS, 90_000),
        applyTimeoutMs: readTimeout(env.NEXT_PUBLIC_APPLY_TIMEOUT_MS, 60_000),
        reportTimeoutMs: readTimeout(env.NEXT_PUBLIC_REPORT_TIMEOUT_MS, 60_000),
    };
}
