export type Severity = "high" | "med" | "low";

export type SeverityFilter = "all" | Severity;

/**
 * A finding exactly as the scanner reports it. Every field may be missing;
 * `normalizeFindings` fills the gaps before anything is rendered.
 */
export interface Finding {
    id?: string;
    severity?: string;
    title?: string;
    details?: string;
    evidence?: unknown;
}

export interface ScanResult {
    score: number;
    findings: Finding[];
}

/**
 * Outbound body for POST /scan. Exactly one variant is ever sent.
 */
export type ScanPayload =
    | { url: string }
    | { file: string }
    | { openapi: string }
    | { demo: true };

export interface ScanInputs {
    url: string;
    file: Uint8Array | null;
    openapiText: string;
}

export type ScanPhase = "Idle" | "Scanning" | "Scanned" | "Applying";

export type ScanEvent =
    | { type: "scan" }
    | { type: "apply" }
    | { type: "success" }
    | { type: "failure"; hasResult: boolean }
    | { type: "reset" };

export interface NormalizedFinding {
    id: string;
    severity: Severity | null;
    rank: number;
    title: string;
    heading: string;
    details: string | null;
    evidence: string | null;
}

export type ScoreLabel = "Excellent" | "Good" | "Fair" | "Poor";

export interface ResultsView {
    score: number;
    scoreText: string;
    proportion: number;
    label: ScoreLabel;
    findings: NormalizedFinding[];
    totalFindings: number;
    emptyMessage: string | null;
}
