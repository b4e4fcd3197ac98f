import type { ScanEvent, ScanPhase } from "./types";

/**
 * Transition table for one scan session. Events that have no edge from the
 * current phase leave it unchanged.
 */
export function transition(phase: ScanPhase, event: ScanEvent): ScanPhase {
    switch (event.type) {
        case "scan":
            return phase === "Idle" || phase === "Scanned" ? "Scanning" : phase;
        case "apply":
            return phase === "Scanned" ? "Applying" : phase;
        case "success":
            return phase === "Scanning" || phase === "Applying" ? "Scanned" : phase;
        case "failure":
            if (phase === "Applying") return "Scanned";
            if (phase === "Scanning") return event.hasResult ? "Scanned" : "Idle";
            return phase;
        case "reset":
            return "Idle";
    }
}

export function isBusy(phase: ScanPhase): boolean {
    return phase === "Scanning" || phase === "Applying";
}
