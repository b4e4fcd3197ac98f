"use client";

import React, { useEffect, useState } from 'react';
import { Server, AlertTriangle } from 'lucide-react';
import { useScanSession } from './ScanSessionProvider';

export default function BackendSettings() {
    const { session, state } = useScanSession();
    const [draft, setDraft] = useState(state.backendUrl);

    // Keep the field in sync when the stored value is normalized.
    useEffect(() => {
        setDraft(state.backendUrl);
    }, [state.backendUrl]);

    const commit = () => {
        session.setBackendUrl(draft);
        setDraft(session.getState().backendUrl);
    };

    return (
        <div className="terminal-box p-4 space-y-4">
            <h2 className="section-title flex items-center gap-2">
                <Server size={14} />
                SETTINGS
            </h2>

            <label className="block space-y-2">
                <span className="text-xs text-terminal-dim uppercase tracking-wider">Backend URL</span>
                <input
                    type="text"
                    className="cyber-input w-full"
                    value={draft}
                    onChange={(e) => setDraft(e.target.value)}
                    onBlur={commit}
                    onKeyDown={(e) => {
                        if (e.key === 'Enter') commit();
                    }}
                    placeholder="https://<name>.example.app"
                />
                <span className="block text-[11px] text-terminal-dim">
                    Base URL of the scanning service. Trailing slashes are ignored.
                </span>
            </label>

            <div className="border-t border-terminal-border pt-4 flex gap-2 text-xs text-terminal-text">
                <AlertTriangle size={14} className="text-terminal-red shrink-0 mt-0.5" />
                <span>
                    <span className="font-bold text-terminal-textBright">Ethics:</span> Scan only apps you own.
                    No data stored. Rate-limited.
                </span>
            </div>
        </div>
    );
}
