"use client";

import React, { createContext, useContext, useState, useSyncExternalStore } from 'react';
import { loadClientConfig, type ClientConfig } from '@/lib/config';
import { createScanController, type ScanController } from '@/lib/controller';
import { createScanSession, type ScanSession, type ScanSessionState } from '@/lib/session';

interface ScanSessionContextType {
    session: ScanSession;
    controller: ScanController;
}

const ScanSessionContext = createContext<ScanSessionContextType | null>(null);

export function useScanSession(): ScanSessionContextType & { state: Readonly<ScanSessionState> } {
    const ctx = useContext(ScanSessionContext);
    if (!ctx) {
        throw new Error('useScanSession must be used inside <ScanSessionProvider>');
    }
    const state = useSyncExternalStore(ctx.session.subscribe, ctx.session.getState, ctx.session.getState);
    return { ...ctx, state };
}

export default function ScanSessionProvider({
    children,
    config,
}: {
    children: React.ReactNode;
    config?: ClientConfig;
}) {
    // One session per mounted tree; it lives exactly as long as the tab.
    const [value] = useState<ScanSessionContextType>(() => {
        const resolved = config ?? loadClientConfig();
        const session = createScanSession(resolved.backendUrl);
        return { session, controller: createScanController(session, resolved) };
    });

    return (
        <ScanSessionContext.Provider value={value}>
            {children}
        </ScanSessionContext.Provider>
    );
}
