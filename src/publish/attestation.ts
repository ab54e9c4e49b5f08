import { AuthorizedApp, Platform, Publish } from '../types.js';

export type AttestationInput = {
    app: AuthorizedApp;
    publish: Publish;
    // base64(SHA-256(canonical cleartext)), see crypto/nonce.ts
    nonce: string;
};

/**
 * Checks a platform attestation payload (DeviceCheck, SafetyNet, ...) against
 * the nonce of the request it arrived with.
 */
export interface AttestationVerifier {
    readonly platform: Platform;
    verify(input: AttestationInput): Promise<boolean>;
}

export function verifierFor(
    verifiers: readonly AttestationVerifier[],
    platform: Platform
): AttestationVerifier | undefined {
    return verifiers.find((v) => v.platform === platform);
}
