import crypto from 'node:crypto';
import { ExposureKey, Publish } from '../types.js';

// Field separator of the cleartext. Part of the contract with the device
// attestation APIs: changing it (or any sort order below) breaks verification.
const FIELD_SEPARATOR = '|';
const LIST_SEPARATOR = ',';

function compareUtf8(a: string, b: string): number {
    return Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
}

function renderKey(k: ExposureKey): string {
    return `${k.key}.${k.intervalNumber}.${k.intervalCount}.${k.transmissionRisk}`;
}

/**
 * Builds the attestation cleartext of a publish request:
 *
 *     appPackageName|key[,key]|region[,region]|verificationPayload
 *
 * Keys render as `base64key.intervalNumber.intervalCount.transmissionRisk`, sorted
 * by their encoded key string. Regions are upper-cased, then sorted. Absent fields
 * render as the empty string; all four fields are always present.
 */
export function canonicalCleartext(publish: Publish): string {
    const keys = publish.keys
        .map((k) => ({ encoded: k.key, rendered: renderKey(k) }))
        .sort((a, b) => compareUtf8(a.encoded, b.encoded) || compareUtf8(a.rendered, b.rendered))
        .map((k) => k.rendered);

    const regions = publish.regions.map((r) => r.toUpperCase()).sort(compareUtf8);

    return [
        publish.appPackageName,
        keys.join(LIST_SEPARATOR),
        regions.join(LIST_SEPARATOR),
        publish.verificationPayload ?? '',
    ].join(FIELD_SEPARATOR);
}

/**
 * Nonce binding a device attestation to the content of a publish request:
 * base64(SHA-256(canonical cleartext)). Independent of key and region order.
 */
export function attestationNonce(publish: Publish): string {
    return crypto.createHash('sha256').update(canonicalCleartext(publish), 'utf8').digest('base64');
}
