import type { ScanInputs, ScanPayload } from "./types";

/** Length of the well-formed UTF-8 sequence starting at `i`, or 0 if there is none. */
function sequenceLength(bytes: Uint8Array, i: number): number {
    const lead = bytes[i];
    const cont = (offset: number, min = 0x80, max = 0xbf) => {
        const b = bytes[i + offset];
        return b !== undefined && b >= min && b <= max;
    };
    if (lead < 0x80) return 1;
    if (lead >= 0xc2 && lead <= 0xdf) return cont(1) ? 2 : 0;
    if (lead === 0xe0) return cont(1, 0xa0) && cont(2) ? 3 : 0;
    if (lead === 0xed) return cont(1, 0x80, 0x9f) && cont(2) ? 3 : 0;
    if (lead >= 0xe1 && lead <= 0xef) return cont(1) && cont(2) ? 3 : 0;
    if (lead === 0xf0) return cont(1, 0x90) && cont(2) && cont(3) ? 4 : 0;
    if (lead === 0xf4) return cont(1, 0x80, 0x8f) && cont(2) && cont(3) ? 4 : 0;
    if (lead >= 0xf1 && lead <= 0xf3) return cont(1) && cont(2) && cont(3) ? 4 : 0;
    return 0;
}

function dropInvalidSequences(bytes: Uint8Array): Uint8Array {
    const kept: number[] = [];
    let i = 0;
    while (i < bytes.length) {
        const len = sequenceLength(bytes, i);
        if (len === 0) {
            i += 1;
            continue;
        }
        for (let k = 0; k < len; k++) kept.push(bytes[i + k]);
        i += len;
    }
    return Uint8Array.from(kept);
}

/**
 * Decode an uploaded export as UTF-8. Undecodable byte sequences are dropped
 * rather than failing the scan; a U+FFFD that was validly encoded is kept.
 */
export function decodeSpecimen(bytes: Uint8Array): string {
    try {
        return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
    } catch {
        return new TextDecoder("utf-8").decode(dropInvalidSequences(bytes));
    }
}

/**
 * Pick the single payload for POST /scan.
 *
 * Priority: live URL, then uploaded file, then pasted OpenAPI text, then the
 * demo fallback. Lower-priority inputs are ignored when a higher one is set.
 */
export function resolveScanPayload(inputs: ScanInputs): ScanPayload {
    const url = inputs.url.trim();
    if (url) {
        return { url };
    }
    if (inputs.file !== null) {
        return { file: decodeSpecimen(inputs.file) };
    }
    if (inputs.openapiText.trim()) {
        return { openapi: inputs.openapiText };
    }
    return { demo: true };
}

export async function readSpecimenFile(file: Blob): Promise<Uint8Array> {
    return new Uint8Array(await file.arrayBuffer());
}

export const DEMO_SPECIMEN = {
    endpoints: [
        { path: "/users", auth: "none", returns: ["email", "name"] },
        { path: "/search", auth: "none", cors: "*" },
        { path: "/bundle.js", leaks: ["X-API-Key"] },
    ],
};

export function demoSpecimenText(): string {
    return JSON.stringify(DEMO_SPECIMEN, null, 2);
}
