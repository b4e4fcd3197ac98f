import React from 'react';
import { AlertTriangle, Check } from 'lucide-react';

export default function StatusBanner({ error, notice }: { error: string | null; notice: string | null }) {
    if (error) {
        return (
            <div role="alert" className="p-3 bg-terminal-red/10 border border-terminal-red/30 rounded text-terminal-red text-sm font-mono">
                <div className="flex items-start gap-2">
                    <AlertTriangle size={16} className="mt-0.5 flex-shrink-0" />
                    <span>{error}</span>
                </div>
            </div>
        );
    }
    if (notice) {
        return (
            <div role="status" className="p-3 bg-terminal-accent/10 border border-terminal-accent/30 rounded text-terminal-text text-sm font-mono">
                <div className="flex items-start gap-2">
                    <Check size={16} className="mt-0.5 flex-shrink-0" />
                    <span>{notice}</span>
                </div>
            </div>
        );
    }
    return null;
}
