"use client";

import React, { useState } from 'react';
import { Code, Download, Loader2, RotateCcw, Shield, Wrench } from 'lucide-react';
import { downloadBlob, REPORT_FILENAME } from '@/lib/download';
import { isBusy } from '@/lib/scanMachine';
import { buildResultsView, SEVERITY_FILTERS } from '@/lib/view';
import { cn } from '@/lib/utils';
import type { NormalizedFinding, ScoreLabel } from '@/lib/types';
import { useScanSession } from './ScanSessionProvider';

const SEVERITY_CLASSES: Record<string, string> = {
    high: 'border-terminal-red text-terminal-red',
    med: 'border-terminal-text text-terminal-text',
    low: 'border-terminal-dim text-terminal-dim',
};

const LABEL_CLASSES: Record<ScoreLabel, string> = {
    Excellent: 'text-terminal-textBright',
    Good: 'text-terminal-text',
    Fair: 'text-terminal-text',
    Poor: 'text-terminal-red',
};

function FindingEntry({
    finding,
    disabled,
    applying,
    onApply,
}: {
    finding: NormalizedFinding;
    disabled: boolean;
    applying: boolean;
    onApply: (id: string) => void;
}) {
    return (
        <details className="terminal-box p-4 hover:border-terminal-accent/50 transition-all duration-200 group">
            <summary
                className={cn(
                    'cursor-pointer font-bold list-none',
                    SEVERITY_CLASSES[finding.severity ?? ''] ?? 'text-terminal-dim'
                )}
            >
                {finding.heading}
            </summary>

            <div className="mt-3 space-y-4">
                {finding.details && (
                    <p className="text-sm text-terminal-text">{finding.details}</p>
                )}

                {finding.evidence !== null && (
                    <div className="bg-black/30 p-3 rounded border border-terminal-border/50">
                        <span className="text-xs font-bold text-terminal-dim uppercase flex items-center gap-2 mb-2">
                            <Code size={12} /> Evidence
                        </span>
                        <pre className="text-xs font-mono text-terminal-text overflow-x-auto whitespace-pre-wrap break-all">
                            {finding.evidence}
                        </pre>
                    </div>
                )}

                <button
                    type="button"
                    onClick={() => onApply(finding.id)}
                    disabled={disabled}
                    className="cyber-button-outline flex items-center gap-2 text-xs py-1.5 px-3"
                >
                    {applying ? <Loader2 className="animate-spin" size={12} /> : <Wrench size={12} />}
                    <span>{`Fix via Wrapper — ${finding.id}`}</span>
                </button>
            </div>
        </details>
    );
}

export default function ResultsPanel() {
    const { session, controller, state } = useScanSession();
    const [applyingId, setApplyingId] = useState<string | null>(null);
    const [exporting, setExporting] = useState(false);

    const result = state.currentResult;
    if (!result) {
        return (
            <div className="text-terminal-dim italic p-4 terminal-box">
                Run a scan to see results.
            </div>
        );
    }

    const view = buildResultsView(result, state.severityFilter);
    const busy = isBusy(state.phase);

    const handleApply = async (id: string) => {
        setApplyingId(id);
        try {
            await controller.applyFix(id);
        } finally {
            setApplyingId(null);
        }
    };

    const handleExport = async () => {
        setExporting(true);
        try {
            const blob = await controller.exportReport();
            if (blob) {
                downloadBlob(blob, REPORT_FILENAME);
            }
        } finally {
            setExporting(false);
        }
    };

    return (
        <div className="flex flex-col gap-6">
            {/* Score */}
            <div className="terminal-box-glow p-4 space-y-3">
                <div className="flex justify-between items-end">
                    <div>
                        <div className="text-xs text-terminal-dim uppercase tracking-wider">Security Score</div>
                        <div className="text-5xl font-bold text-terminal-textBright" data-testid="score">
                            {view.scoreText}
                        </div>
                    </div>
                    <div className={cn('text-xl font-bold uppercase', LABEL_CLASSES[view.label])} data-testid="score-label">
                        {view.label}
                    </div>
                </div>
                <div
                    role="progressbar"
                    aria-valuemin={0}
                    aria-valuemax={100}
                    aria-valuenow={view.score}
                    className="h-2 w-full bg-terminal-border rounded overflow-hidden"
                >
                    <div
                        className="h-full bg-terminal-accent transition-all duration-300"
                        style={{ width: `${view.proportion * 100}%` }}
                    />
                </div>
            </div>

            {/* Findings */}
            <div className="space-y-4">
                <div className="flex items-center justify-between gap-4 flex-wrap">
                    <h3 className="section-title flex items-center gap-2">
                        <Shield size={14} />
                        FINDINGS
                    </h3>
                    <div className="flex terminal-box p-1" role="group" aria-label="Filter by severity">
                        {SEVERITY_FILTERS.map((filter) => (
                            <button
                                key={filter}
                                type="button"
                                aria-pressed={state.severityFilter === filter}
                                onClick={() => session.setSeverityFilter(filter)}
                                className={cn(
                                    'px-3 py-1 rounded text-xs font-bold uppercase transition-all',
                                    state.severityFilter === filter
                                        ? 'bg-terminal-accent text-terminal-bg'
                                        : 'text-terminal-dim hover:text-terminal-text hover:bg-terminal-border/30'
                                )}
                            >
                                {filter}
                            </button>
                        ))}
                    </div>
                </div>

                {view.emptyMessage ? (
                    <div className="text-terminal-dim italic p-4 terminal-box">{view.emptyMessage}</div>
                ) : (
                    view.findings.map((finding, i) => (
                        <FindingEntry
                            key={`${finding.id}:${i}`}
                            finding={finding}
                            disabled={busy}
                            applying={applyingId === finding.id}
                            onApply={handleApply}
                        />
                    ))
                )}
            </div>

            {/* Actions */}
            <div className="grid grid-cols-2 gap-4 pt-6 border-t border-terminal-border">
                <button
                    type="button"
                    onClick={handleExport}
                    disabled={exporting || busy}
                    className="cyber-button flex items-center justify-center gap-2"
                >
                    {exporting ? <Loader2 className="animate-spin" size={16} /> : <Download size={16} />}
                    <span className="uppercase tracking-wider text-sm">Export PDF Report</span>
                </button>
                <button
                    type="button"
                    onClick={controller.reset}
                    disabled={exporting || busy}
                    className="cyber-button-outline flex items-center justify-center gap-2"
                >
                    <RotateCcw size={16} />
                    <span className="uppercase tracking-wider text-sm">Scan another app</span>
                </button>
            </div>
        </div>
    );
}
