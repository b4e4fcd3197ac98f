import type {
    Finding,
    NormalizedFinding,
    ResultsView,
    ScanResult,
    ScoreLabel,
    Severity,
    SeverityFilter,
} from "./types";

export const SEVERITY_FILTERS: SeverityFilter[] = ["all", "high", "med", "low"];

const SEVERITY_RANK: Record<Severity, number> = {
    high: 3,
    med: 2,
    low: 1,
};

export const NO_FINDINGS_MESSAGE = "No active findings.";
export const FILTERED_OUT_MESSAGE = "No findings for this filter.";

/** Only the exact strings `high`, `med` and `low` count; anything else is unknown. */
export function parseSeverity(raw: unknown): Severity | null {
    return raw === "high" || raw === "med" || raw === "low" ? raw : null;
}

export function severityRank(severity: Severity | null): number {
    return severity === null ? 0 : SEVERITY_RANK[severity];
}

export function clampScore(score: number): number {
    return Math.min(Math.max(score, 0), 100);
}

export function scoreLabel(score: number): ScoreLabel {
    if (score >= 80) return "Excellent";
    if (score >= 60) return "Good";
    if (score >= 40) return "Fair";
    return "Poor";
}

/**
 * Pretty-print evidence as JSON. Values JSON cannot represent (cycles,
 * BigInt, functions) are rendered with String().
 */
export function formatEvidence(evidence: unknown): string | null {
    if (evidence === undefined || evidence === null) return null;
    try {
        const json = JSON.stringify(evidence, null, 2);
        if (json !== undefined) return json;
    } catch (err) {
        console.warn("Evidence is not JSON-serializable, rendering as text:", err);
    }
    return String(evidence);
}

function nonEmpty(value: string | undefined): value is string {
    return value !== undefined && value.trim() !== "";
}

/**
 * Fill in what the scanner left out: ids fall back to `auto_<index>` and
 * titles to `Finding <index + 1>`, using each finding's position as received.
 */
export function normalizeFindings(findings: Finding[]): NormalizedFinding[] {
    return findings.map((finding, index) => {
        const severity = parseSeverity(finding.severity);
        const title = nonEmpty(finding.title) ? finding.title : `Finding ${index + 1}`;
        const severityLabel = nonEmpty(finding.severity)
            ? finding.severity.trim().toUpperCase()
            : "UNKNOWN";

        return {
            id: nonEmpty(finding.id) ? finding.id : `auto_${index}`,
            severity,
            rank: severityRank(severity),
            title,
            heading: `${severityLabel} — ${title}`,
            details: nonEmpty(finding.details) ? finding.details : null,
            evidence: formatEvidence(finding.evidence),
        };
    });
}

export function filterFindings<T extends { severity: Severity | null }>(
    items: readonly T[],
    filter: SeverityFilter
): T[] {
    if (filter === "all") return [...items];
    return items.filter((item) => item.severity === filter);
}

/** Highest severity first; equal ranks keep their incoming order. */
export function sortFindings<T extends { rank: number }>(items: readonly T[]): T[] {
    return items
        .map((item, index) => ({ item, index }))
        .sort((a, b) => b.item.rank - a.item.rank || a.index - b.index)
        .map(({ item }) => item);
}

export function buildResultsView(result: ScanResult, filter: SeverityFilter): ResultsView {
    const score = clampScore(result.score);
    const normalized = normalizeFindings(result.findings);
    const findings = sortFindings(filterFindings(normalized, filter));

    let emptyMessage: string | null = null;
    if (normalized.length === 0) {
        emptyMessage = NO_FINDINGS_MESSAGE;
    } else if (findings.length === 0) {
        emptyMessage = FILTERED_OUT_MESSAGE;
    }

    return {
        score,
        scoreText: `${score}/100`,
        proportion: score / 100,
        label: scoreLabel(score),
        findings,
        totalFindings: normalized.length,
        emptyMessage,
    };
}
