export type ErrorResponse = {
    error: { code: string; message: string; details?: unknown };
};

export type Success<T> = { data: T };

export type Platform = 'ios' | 'android';

// Only valid exposure key length, after base64 decoding.
export const KEY_LENGTH = 16;

// Inclusive bounds.
export const MIN_INTERVAL_COUNT = 1;
export const MAX_INTERVAL_COUNT = 144;
export const MIN_TRANSMISSION_RISK = 0; // 0 means no or unknown risk
export const MAX_TRANSMISSION_RISK = 8;

// 21 days worth of keys is the hard ceiling for one publish request.
export const MAX_KEYS_PER_PUBLISH = 21;

/**
 * A temporary exposure key as submitted by a device. `key` stays in its
 * transport (base64) encoding; it is decoded by the transformer.
 */
export interface ExposureKey {
    readonly key: string;
    readonly intervalNumber: number;
    readonly intervalCount: number;
    readonly transmissionRisk: number;
}

/** A publish request: one batch of keys from one device. */
export interface Publish {
    readonly keys: readonly ExposureKey[];
    readonly regions: readonly string[];
    readonly appPackageName: string;
    readonly platform: Platform;
    readonly deviceVerificationPayload?: string;
    readonly verificationPayload?: string;
    readonly padding?: string;
}

/** The record handed to storage, one per accepted key. */
export interface Exposure {
    readonly exposureKey: Buffer;
    readonly transmissionRisk: number;
    readonly appPackageName: string;
    readonly regions: readonly string[];
    readonly intervalNumber: number;
    readonly intervalCount: number;
    readonly createdAt: Date;
    readonly localProvenance: boolean;
    readonly federationSyncId?: number;
}

export interface AuthorizedApp {
    readonly appPackageName: string;
    readonly platform: Platform;
    readonly allowedRegions: readonly string[];
    readonly attestationDisabled: boolean;
    readonly maxExposureKeys?: number;
    readonly maxIntervalStartAgeMs?: number;
}

export interface StoredExposure {
    exposureKey: string; // base64
    transmissionRisk: number;
    appPackageName: string;
    regions: string[];
    intervalNumber: number;
    intervalCount: number;
    createdAt: string; // ISO-8601
    localProvenance: boolean;
    federationSyncId?: number;
}
