import React from 'react';
import { ShieldCheck } from 'lucide-react';

export default function TerminalShell({
    sidebar,
    children,
}: {
    sidebar?: React.ReactNode;
    children: React.ReactNode;
}) {
    return (
        <div className="min-h-screen bg-terminal-bg p-4 md:p-8 flex flex-col">
            <header className="mb-8 border-b border-terminal-border pb-6 flex items-start justify-between">
                <div>
                    <h1 className="pixel-title text-xl md:text-2xl flex items-center gap-3">
                        <ShieldCheck className="text-terminal-accent" size={24} />
                        DEVGUARD
                    </h1>
                    <p className="text-terminal-dim text-xs mt-1 font-mono">
                        Scan your no-code export
                    </p>
                </div>
            </header>

            <div className="flex-1 grid grid-cols-1 lg:grid-cols-[280px_1fr] gap-8 max-w-7xl mx-auto w-full">
                {sidebar && <aside className="flex flex-col gap-6">{sidebar}</aside>}
                <main className="flex flex-col gap-6 min-w-0">
                    {children}
                </main>
            </div>

            <footer className="mt-8 pt-4 border-t border-terminal-border">
                <div className="flex items-center gap-2 text-terminal-text text-sm font-mono">
                    <span>user@devguard</span>
                    <span className="text-terminal-dim">:</span>
                    <span>~</span>
                    <span className="text-terminal-dim">$</span>
                    <span className="animate-pulse">▌</span>
                </div>
            </footer>
        </div>
    );
}
