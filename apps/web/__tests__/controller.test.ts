/**
 * @jest-environment node
 */
import { createScanController, type ScanBackend } from '../lib/controller';
import { ScanApiError } from '../lib/errors';
import { createScanSession } from '../lib/session';
import type { ScanResult } from '../lib/types';

const TIMEOUTS = { scanTimeoutMs: 90_000, applyTimeoutMs: 60_000, reportTimeoutMs: 60_000 };
const EMPTY_FORM = { url: '', file: null, openapiText: '' };

const demoResult: ScanResult = { score: 42, findings: [{ severity: 'high', title: 'No auth on /users' }] };
const fixedResult: ScanResult = { score: 78, findings: [] };

function deferred<T>() {
    let resolve: (value: T) => void = () => {};
    const promise = new Promise<T>((r) => {
        resolve = r;
    });
    return { promise, resolve };
}

function setup() {
    const backend = {
        runScan: jest.fn<ReturnType<ScanBackend['runScan']>, Parameters<ScanBackend['runScan']>>(),
        applyFixes: jest.fn<ReturnType<ScanBackend['applyFixes']>, Parameters<ScanBackend['applyFixes']>>(),
        fetchReport: jest.fn<ReturnType<ScanBackend['fetchReport']>, Parameters<ScanBackend['fetchReport']>>(),
    };
    const session = createScanSession('http://scanner.test/');
    const controller = createScanController(session, TIMEOUTS, backend);
    return { backend, session, controller };
}

describe('scan controller', () => {
    let errorSpy: jest.SpyInstance;

    beforeEach(() => {
        errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        errorSpy.mockRestore();
    });

    it('sends the demo payload and records the result', async () => {
        const { backend, session, controller } = setup();
        backend.runScan.mockResolvedValue(demoResult);

        await expect(controller.runScan(EMPTY_FORM)).resolves.toBe('ok');

        expect(backend.runScan).toHaveBeenCalledWith('http://scanner.test', { demo: true }, 90_000);
        const state = session.getState();
        expect(state.currentResult).toEqual(demoResult);
        expect(state.phase).toBe('Scanned');
        expect(state.notice).toBe('Scan complete');
    });

    it('decodes an uploaded file before sending it', async () => {
        const { backend, controller } = setup();
        backend.runScan.mockResolvedValue(demoResult);

        await controller.runScan({ url: '', file: new Blob(['name: shop']), openapiText: '{}' });

        expect(backend.runScan).toHaveBeenCalledWith('http://scanner.test', { file: 'name: shop' }, 90_000);
    });

    it('is Scanning while the request is in flight', async () => {
        const { backend, session, controller } = setup();
        const pending = deferred<ScanResult>();
        backend.runScan.mockReturnValue(pending.promise);

        const run = controller.runScan({ ...EMPTY_FORM, url: 'https://x' });
        await Promise.resolve();
        expect(session.getState().phase).toBe('Scanning');

        pending.resolve(demoResult);
        await run;
        expect(session.getState().phase).toBe('Scanned');
    });

    it('leaves the store untouched and returns to Idle when the first scan fails', async () => {
        const { backend, session, controller } = setup();
        backend.runScan.mockRejectedValue(new ScanApiError('HTTP', 'HTTP 500', { status: 500 }));

        await expect(controller.runScan(EMPTY_FORM)).resolves.toBe('failed');

        const state = session.getState();
        expect(state.currentResult).toBeNull();
        expect(state.phase).toBe('Idle');
        expect(state.error).toBe('Scan failed: HTTP 500');
        expect(errorSpy).toHaveBeenCalledTimes(1);
    });

    it('keeps the previous result exactly when a re-scan fails', async () => {
        const { backend, session, controller } = setup();
        backend.runScan.mockResolvedValueOnce(demoResult);
        await controller.runScan(EMPTY_FORM);
        const before = session.getState().currentResult;

        backend.runScan.mockRejectedValueOnce(new Error('timeout'));
        await controller.runScan(EMPTY_FORM);

        expect(session.getState().currentResult).toBe(before);
        expect(session.getState().phase).toBe('Scanned');
    });

    it('replaces the whole result after a successful apply', async () => {
        const { backend, session, controller } = setup();
        backend.runScan.mockResolvedValue(demoResult);
        backend.applyFixes.mockResolvedValue(fixedResult);
        await controller.runScan(EMPTY_FORM);
        session.setSeverityFilter('low');

        await expect(controller.applyFix('auto_0')).resolves.toBe('ok');

        expect(backend.applyFixes).toHaveBeenCalledWith('http://scanner.test', ['auto_0'], 60_000);
        const state = session.getState();
        expect(state.currentResult?.score).toBe(78);
        expect(state.currentResult?.findings).toEqual([]);
        expect(state.severityFilter).toBe('all');
        expect(state.notice).toBe('Fix applied and re-scanned.');
    });

    it('keeps the result exactly when apply fails', async () => {
        const { backend, session, controller } = setup();
        backend.runScan.mockResolvedValue(demoResult);
        backend.applyFixes.mockRejectedValue(new ScanApiError('TIMEOUT', 'Request timed out after 60s'));
        await controller.runScan(EMPTY_FORM);
        const before = session.getState().currentResult;

        await expect(controller.applyFix('auto_0')).resolves.toBe('failed');

        expect(session.getState().currentResult).toBe(before);
        expect(session.getState().phase).toBe('Scanned');
        expect(session.getState().error).toBe('Apply failed: Request timed out after 60s');
    });

    it('ignores apply before anything has been scanned', async () => {
        const { backend, controller } = setup();

        await expect(controller.applyFix('auto_0')).resolves.toBe('ignored');
        expect(backend.applyFixes).not.toHaveBeenCalled();
    });

    it('discards a scan response that arrives after a reset', async () => {
        const { backend, session, controller } = setup();
        const pending = deferred<ScanResult>();
        backend.runScan.mockReturnValue(pending.promise);

        const run = controller.runScan(EMPTY_FORM);
        controller.reset();
        pending.resolve(demoResult);

        await expect(run).resolves.toBe('discarded');
        expect(session.getState().currentResult).toBeNull();
        expect(session.getState().phase).toBe('Idle');
    });

    it('returns the report blob', async () => {
        const { backend, controller } = setup();
        const blob = new Blob(['%PDF']);
        backend.fetchReport.mockResolvedValue(blob);

        await expect(controller.exportReport()).resolves.toBe(blob);
        expect(backend.fetchReport).toHaveBeenCalledWith('http://scanner.test', 60_000);
    });

    it('offers nothing when the report fetch fails', async () => {
        const { backend, session, controller } = setup();
        backend.fetchReport.mockRejectedValue(new ScanApiError('HTTP', 'HTTP 404 Not Found', { status: 404 }));

        await expect(controller.exportReport()).resolves.toBeNull();
        expect(session.getState().error).toBe('Could not fetch PDF: HTTP 404 Not Found');
    });

    it('offers nothing when the session is reset while the report loads', async () => {
        const { backend, session, controller } = setup();
        const pending = deferred<Blob>();
        backend.fetchReport.mockReturnValue(pending.promise);

        const exporting = controller.exportReport();
        controller.reset();
        pending.resolve(new Blob(['%PDF']));

        await expect(exporting).resolves.toBeNull();
        expect(session.getState().error).toBeNull();
    });

    it('resets the session to Idle', async () => {
        const { backend, session, controller } = setup();
        backend.runScan.mockResolvedValue(demoResult);
        controller.loadDemo();
        await controller.runScan(EMPTY_FORM);
        session.setSeverityFilter('high');

        controller.reset();

        const state = session.getState();
        expect(state.currentResult).toBeNull();
        expect(state.demoSpecimen).toBeNull();
        expect(state.phase).toBe('Idle');
        expect(state.severityFilter).toBe('all');
        expect(state.notice).toBeNull();
    });

    it('uses the backend URL current at the time of the call', async () => {
        const { backend, session, controller } = setup();
        backend.runScan.mockResolvedValue(demoResult);
        session.setBackendUrl('https://other.test///');

        await controller.runScan(EMPTY_FORM);

        expect(backend.runScan.mock.calls[0][0]).toBe('https://other.test');
    });
});
