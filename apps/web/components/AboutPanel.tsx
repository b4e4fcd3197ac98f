import React from 'react';
import { Info } from 'lucide-react';

export default function AboutPanel() {
    return (
        <div className="terminal-box p-6 space-y-4 text-sm text-terminal-text">
            <h2 className="section-title flex items-center gap-2">
                <Info size={14} />
                ABOUT / ETHICS
            </h2>
            <p>
                <span className="font-bold text-terminal-textBright">DevGuard</span> scans no-code/low-code app
                exports using platform-aware rulepacks and suggests fixes.
            </p>
            <ul className="space-y-2">
                <li className="flex gap-2">
                    <span className="text-terminal-red">•</span>
                    <span>We only scan assets you provide in this session; no persistent storage.</span>
                </li>
                <li className="flex gap-2">
                    <span className="text-terminal-red">•</span>
                    <span>Use on apps you own. Be considerate: probing is rate-limited.</span>
                </li>
                <li className="flex gap-2">
                    <span className="text-terminal-red">•</span>
                    <span>Wrapper auto-fix simulates guardrails (rate limits, CORS, headers) and re-scores the app.</span>
                </li>
            </ul>
        </div>
    );
}
