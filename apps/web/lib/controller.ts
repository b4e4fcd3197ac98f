import * as api from "./api";
import { describeError } from "./errors";
import { demoSpecimenText, readSpecimenFile, resolveScanPayload } from "./resolveInput";
import type { ClientConfig } from "./config";
import type { ScanSession } from "./session";
import type { ScanPayload, ScanResult } from "./types";

export interface ScanBackend {
    runScan(baseUrl: string, payload: ScanPayload, timeoutMs: number): Promise<ScanResult>;
    applyFixes(baseUrl: string, ids: string[], timeoutMs: number): Promise<ScanResult>;
    fetchReport(baseUrl: string, timeoutMs: number): Promise<Blob>;
}

export interface ScanForm {
    url: string;
    file: Blob | null;
    openapiText: string;
}

/**
 * `discarded` means the response arrived after a newer action had already
 * produced a result (or the session was reset) and was dropped.
 */
export type ActionOutcome = "ok" | "failed" | "discarded" | "ignored";

export interface ScanController {
    runScan(form: ScanForm): Promise<ActionOutcome>;
    applyFix(findingId: string): Promise<ActionOutcome>;
    /** Resolves to null when the download failed or the session was reset meanwhile. */
    exportReport(): Promise<Blob | null>;
    reset(): void;
    loadDemo(): void;
}

export const SCAN_COMPLETE = "Scan complete";
export const FIX_APPLIED = "Fix applied and re-scanned.";

const defaultBackend: ScanBackend = {
    runScan: api.runScan,
    applyFixes: api.applyFixes,
    fetchReport: api.fetchReport,
};

export function createScanController(
    session: ScanSession,
    config: Pick<ClientConfig, "scanTimeoutMs" | "applyTimeoutMs" | "reportTimeoutMs">,
    backend: ScanBackend = defaultBackend
): ScanController {
    function fail(ticket: number, prefix: string, err: unknown): ActionOutcome {
        if (!session.isCurrent(ticket)) return "discarded";
        console.error(`${prefix}:`, err);
        session.setError(`${prefix}: ${describeError(err)}`);
        session.dispatch({ type: "failure", hasResult: session.getState().currentResult !== null });
        return "failed";
    }

    return {
        async runScan(form) {
            const ticket = session.issueTicket();
            session.setError(null);
            session.setNotice(null);
            session.dispatch({ type: "scan" });

            let result: ScanResult;
            try {
                const file = form.file ? await readSpecimenFile(form.file) : null;
                const payload = resolveScanPayload({ url: form.url, file, openapiText: form.openapiText });
                result = await backend.runScan(session.getState().backendUrl, payload, config.scanTimeoutMs);
            } catch (err) {
                return fail(ticket, "Scan failed", err);
            }

            if (!session.recordResult(result, ticket)) return "discarded";
            session.setSeverityFilter("all");
            session.dispatch({ type: "success" });
            session.setNotice(SCAN_COMPLETE);
            return "ok";
        },

        async applyFix(findingId) {
            if (session.getState().phase !== "Scanned") return "ignored";

            const ticket = session.issueTicket();
            session.setError(null);
            session.setNotice(null);
            session.dispatch({ type: "apply" });

            let result: ScanResult;
            try {
                result = await backend.applyFixes(session.getState().backendUrl, [findingId], config.applyTimeoutMs);
            } catch (err) {
                return fail(ticket, "Apply failed", err);
            }

            if (!session.recordResult(result, ticket)) return "discarded";
            session.setSeverityFilter("all");
            session.dispatch({ type: "success" });
            session.setNotice(FIX_APPLIED);
            return "ok";
        },

        async exportReport() {
            const ticket = session.issueTicket();
            session.setError(null);
            let report: Blob;
            try {
                report = await backend.fetchReport(session.getState().backendUrl, config.reportTimeoutMs);
            } catch (err) {
                if (!session.isCurrent(ticket)) return null;
                console.error("Could not fetch PDF:", err);
                session.setError(`Could not fetch PDF: ${describeError(err)}`);
                return null;
            }
            // A report fetched for a session that was reset since is not offered.
            return session.isCurrent(ticket) ? report : null;
        },

        reset() {
            session.clear();
            session.setSeverityFilter("all");
            session.dispatch({ type: "reset" });
            session.setError(null);
            session.setNotice(null);
        },

        loadDemo() {
            session.loadDemoSpecimen(demoSpecimenText());
        },
    };
}
