import { transition } from "./scanMachine";
import { normalizeBaseUrl } from "./utils";
import type { ScanEvent, ScanPhase, ScanResult, SeverityFilter } from "./types";

export interface ScanSessionState {
    backendUrl: string;
    currentResult: ScanResult | null;
    severityFilter: SeverityFilter;
    phase: ScanPhase;
    error: string | null;
    notice: string | null;
    demoSpecimen: string | null;
}

type Listener = () => void;

export interface ScanSession {
    getState(): Readonly<ScanSessionState>;
    subscribe(listener: Listener): () => void;

    setBackendUrl(value: string): void;
    /**
     * Replace the current result wholesale. When a request ticket is given and
     * a newer request has already committed (or the session was cleared since
     * it was issued), nothing changes and `false` is returned.
     */
    recordResult(result: ScanResult, ticket?: number): boolean;
    /** Drop the current result and any cached specimen; in-flight responses become stale. */
    clear(): void;

    setSeverityFilter(filter: SeverityFilter): void;
    dispatch(event: ScanEvent): void;
    setError(message: string | null): void;
    setNotice(message: string | null): void;
    loadDemoSpecimen(text: string): void;

    issueTicket(): number;
    isCurrent(ticket: number): boolean;
}

/** Session-scoped scan state with subscribers. One instance per tab. */
export function createScanSession(defaultBackendUrl: string): ScanSession {
    let state: ScanSessionState = {
        backendUrl: normalizeBaseUrl(defaultBackendUrl),
        currentResult: null,
        severityFilter: "all",
        phase: "Idle",
        error: null,
        notice: null,
        demoSpecimen: null,
    };
    const listeners = new Set<Listener>();
    let issued = 0;
    let committed = 0;

    function update(patch: Partial<ScanSessionState>) {
        state = { ...state, ...patch };
        listeners.forEach((l) => l());
    }

    return {
        getState: () => state,

        subscribe(listener) {
            listeners.add(listener);
            return () => {
                listeners.delete(listener);
            };
        },

        setBackendUrl(value) {
            update({ backendUrl: normalizeBaseUrl(value) });
        },

        recordResult(result, ticket) {
            if (ticket !== undefined) {
                if (ticket <= committed) return false;
                committed = ticket;
            }
            update({
                currentResult: { score: result.score, findings: [...result.findings] },
            });
            return true;
        },

        clear() {
            committed = issued;
            update({ currentResult: null, demoSpecimen: null });
        },

        setSeverityFilter(filter) {
            update({ severityFilter: filter });
        },

        dispatch(event) {
            const next = transition(state.phase, event);
            if (next !== state.phase) update({ phase: next });
        },

        setError(message) {
            update({ error: message, notice: message === null ? state.notice : null });
        },

        setNotice(message) {
            update({ notice: message, error: message === null ? state.error : null });
        },

        loadDemoSpecimen(text) {
            update({ demoSpecimen: text });
        },

        issueTicket() {
            issued += 1;
            return issued;
        },

        isCurrent(ticket) {
            return ticket > committed;
        },
    };
}
