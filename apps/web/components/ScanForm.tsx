"use client";

import React, { useState } from 'react';
import { FileUp, Globe, Loader2, Play, Sparkles, X } from 'lucide-react';
import { isBusy } from '@/lib/scanMachine';
import { useScanSession } from './ScanSessionProvider';

export default function ScanForm({ onScanned }: { onScanned?: () => void }) {
    const { controller, state } = useScanSession();
    const [url, setUrl] = useState('');
    const [file, setFile] = useState<File | null>(null);
    const [openapiText, setOpenapiText] = useState('');
    const [fileInputKey, setFileInputKey] = useState(0);

    const busy = isBusy(state.phase);
    const showDemo = state.demoSpecimen !== null && !openapiText.trim();

    const handleSubmit = async (e: React.FormEvent) => {
        e.preventDefault();
        const outcome = await controller.runScan({ url, file, openapiText });
        if (outcome === 'ok') {
            onScanned?.();
        }
    };

    const clearFile = () => {
        setFile(null);
        setFileInputKey((k) => k + 1);
    };

    return (
        <form onSubmit={handleSubmit} className="terminal-box-glow p-6 flex flex-col gap-5">
            <div className="grid grid-cols-1 md:grid-cols-2 gap-6">
                <div className="flex flex-col gap-3">
                    <label className="block space-y-2">
                        <span className="text-xs text-terminal-dim uppercase tracking-wider flex items-center gap-2">
                            <FileUp size={12} /> Upload JSON/YAML export
                        </span>
                        <input
                            key={fileInputKey}
                            type="file"
                            accept=".json,.yaml,.yml"
                            className="block w-full text-sm text-terminal-text file:mr-3 file:rounded file:border file:border-terminal-border file:bg-terminal-bg file:text-terminal-text file:px-3 file:py-1"
                            onChange={(e) => setFile(e.target.files?.[0] ?? null)}
                            disabled={busy}
                        />
                    </label>
                    {file && (
                        <div className="flex items-center gap-2 text-xs text-terminal-text font-mono">
                            <span className="truncate">{file.name}</span>
                            <span className="text-terminal-dim">({(file.size / 1024).toFixed(1)} KB)</span>
                            <button
                                type="button"
                                aria-label="Remove file"
                                onClick={clearFile}
                                className="text-terminal-dim hover:text-terminal-red"
                            >
                                <X size={12} />
                            </button>
                        </div>
                    )}

                    <label className="block space-y-2">
                        <span className="text-xs text-terminal-dim uppercase tracking-wider flex items-center gap-2">
                            <Globe size={12} /> …or a live URL
                        </span>
                        <input
                            type="text"
                            className="cyber-input w-full"
                            placeholder="https://your-app.example.com"
                            value={url}
                            onChange={(e) => setUrl(e.target.value)}
                            disabled={busy}
                        />
                    </label>

                    <button
                        type="button"
                        onClick={controller.loadDemo}
                        disabled={busy}
                        className="cyber-button-outline flex items-center justify-center gap-2 text-sm"
                    >
                        <Sparkles size={14} />
                        <span className="uppercase tracking-wider">Quick Demo</span>
                    </button>
                </div>

                <label className="block space-y-2">
                    <span className="text-xs text-terminal-dim uppercase tracking-wider">…or paste OpenAPI JSON</span>
                    <textarea
                        className="cyber-input w-full h-[180px] font-mono text-xs"
                        placeholder={'{\n  "openapi": "3.0.0", ...\n}'}
                        value={openapiText}
                        onChange={(e) => setOpenapiText(e.target.value)}
                        disabled={busy}
                    />
                </label>
            </div>

            {showDemo && (
                <div className="space-y-2">
                    <p className="text-xs text-terminal-text">
                        Loaded demo specimen. Click Run Scan to submit it.
                    </p>
                    <pre className="bg-black/30 p-3 rounded border border-terminal-border/50 text-xs font-mono text-terminal-text overflow-x-auto">
                        {state.demoSpecimen}
                    </pre>
                </div>
            )}

            <button type="submit" disabled={busy} className="cyber-button w-full flex items-center justify-center gap-2">
                {state.phase === 'Scanning' ? <Loader2 className="animate-spin" size={18} /> : <Play size={18} />}
                <span className="uppercase tracking-wider">Run Scan</span>
            </button>

            {state.phase === 'Scanning' && (
                <p className="text-xs text-terminal-dim font-mono animate-pulse">
                    Scanning… Parsing → Applying rules → Scoring
                </p>
            )}
        </form>
    );
}
