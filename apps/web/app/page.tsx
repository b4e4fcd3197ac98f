"use client";

import React, { useState } from 'react';
import { BarChart3, ScrollText, Search } from 'lucide-react';
import TerminalShell from '@/components/TerminalShell';
import BackendSettings from '@/components/BackendSettings';
import ScanForm from '@/components/ScanForm';
import ResultsPanel from '@/components/ResultsPanel';
import AboutPanel from '@/components/AboutPanel';
import StatusBanner from '@/components/StatusBanner';
import { useScanSession } from '@/components/ScanSessionProvider';
import { cn } from '@/lib/utils';

type Tab = 'scan' | 'results' | 'about';

const TABS: { id: Tab; label: string; icon: typeof Search }[] = [
    { id: 'scan', label: 'Scan', icon: Search },
    { id: 'results', label: 'Results', icon: BarChart3 },
    { id: 'about', label: 'About / Ethics', icon: ScrollText },
];

export default function Page() {
    const { state } = useScanSession();
    const [tab, setTab] = useState<Tab>('scan');

    return (
        <TerminalShell sidebar={<BackendSettings />}>
            <div>
                <h2 className="text-lg font-bold text-terminal-textBright">Scan your no-code export</h2>
                <p className="text-xs text-terminal-dim mt-1">
                    Upload an export (JSON/YAML) or paste an OpenAPI spec. Get a Security Score with actionable fixes.
                </p>
            </div>

            <div className="flex terminal-box p-1 self-start" role="tablist">
                {TABS.map(({ id, label, icon: Icon }) => (
                    <button
                        key={id}
                        type="button"
                        role="tab"
                        aria-selected={tab === id}
                        onClick={() => setTab(id)}
                        className={cn(
                            'px-4 py-2 rounded text-sm font-medium transition-all flex items-center gap-2',
                            tab === id
                                ? 'bg-terminal-accent text-terminal-bg'
                                : 'text-terminal-dim hover:text-terminal-text hover:bg-terminal-border/30'
                        )}
                    >
                        <Icon size={16} />
                        <span>{label}</span>
                    </button>
                ))}
            </div>

            <StatusBanner error={state.error} notice={state.notice} />

            {/* Panels stay mounted so form inputs survive tab switches. */}
            <div role="tabpanel" hidden={tab !== 'scan'}>
                <ScanForm onScanned={() => setTab('results')} />
            </div>
            <div role="tabpanel" hidden={tab !== 'results'}>
                <ResultsPanel />
            </div>
            <div role="tabpanel" hidden={tab !== 'about'}>
                <AboutPanel />
            </div>
        </TerminalShell>
    );
}
