import { loadClientConfig } from '../lib/config';

describe('loadClientConfig', () => {
    it('uses defaults when nothing is set', () => {
        expect(loadClientConfig({})).toEqual({
            backendUrl: 'http://localhost:8000',
            scanTimeoutMs: 90_000,
            applyTimeoutMs: 60_000,
            reportTimeoutMs: 60_000,
        });
    });

    it('reads the backend URL and timeouts from the environment', () => {
        const config = loadClientConfig({
            NEXT_PUBLIC_BACKEND_URL: 'https://scanner.test',
            NEXT_PUBLIC_SCAN_TIMEOUT_MS: '30000',
        });
        expect(config.backendUrl).toBe('https://scanner.test');
        expect(config.scanTimeoutMs).toBe(30_000);
        expect(config.applyTimeoutMs).toBe(60_000);
    });

    it('ignores timeouts that are not positive integers', () => {
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
        const config = loadClientConfig({ NEXT_PUBLIC_APPLY_TIMEOUT_MS: 'soon', NEXT_PUBLIC_REPORT_TIMEOUT_MS: '-5' });
        expect(config.applyTimeoutMs).toBe(60_000);
        expect(config.reportTimeoutMs).toBe(60_000);
        expect(warn).toHaveBeenCalledTimes(2);
        warn.mockRestore();
    });
});
