/**
 * Structured context carried by each publish validation failure, keyed by kind.
 * The set of kinds is closed; callers branch on `kind`, never on the message.
 */
export type PublishErrorDetails = {
    InvalidKeyEncoding: { key: string };
    InvalidKeyLength: { length: number; expected: number };
    InvalidIntervalCount: { intervalCount: number; min: number; max: number };
    IntervalTooOld: { intervalNumber: number; minIntervalNumber: number };
    IntervalInFuture: { intervalNumber: number; maxIntervalNumber: number };
    KeyStillValid: { intervalNumber: number; intervalCount: number; maxIntervalNumber: number };
    InvalidTransmissionRisk: { transmissionRisk: number; min: number; max: number };
    EmptyKeySet: Record<string, never>;
    TooManyKeys: { count: number; max: number };
    InvalidPublishData: { index: number; reason: PublishErrorKind };
    MisalignedOverlap: { intervalNumber: number; previousStart: number; previousEnd: number };
    TooManySameStartKeys: { intervalNumber: number; count: number; max: number };
};

export type PublishErrorKind = keyof PublishErrorDetails;

const ERROR_CODES: Readonly<Record<PublishErrorKind, string>> = {
    InvalidKeyEncoding: 'INVALID_KEY_ENCODING',
    InvalidKeyLength: 'INVALID_KEY_LENGTH',
    InvalidIntervalCount: 'INVALID_INTERVAL_COUNT',
    IntervalTooOld: 'INTERVAL_TOO_OLD',
    IntervalInFuture: 'INTERVAL_IN_FUTURE',
    KeyStillValid: 'KEY_STILL_VALID',
    InvalidTransmissionRisk: 'INVALID_TRANSMISSION_RISK',
    EmptyKeySet: 'EMPTY_KEY_SET',
    TooManyKeys: 'TOO_MANY_KEYS',
    InvalidPublishData: 'INVALID_PUBLISH_DATA',
    MisalignedOverlap: 'MISALIGNED_OVERLAP',
    TooManySameStartKeys: 'TOO_MANY_SAME_START_KEYS',
};

/** Wire code for an error kind, as sent in `{ error: { code } }`. */
export function errorCode(kind: PublishErrorKind): string {
    return ERROR_CODES[kind];
}

export class PublishError<K extends PublishErrorKind = PublishErrorKind> extends Error {
    readonly kind: K;
    readonly details: PublishErrorDetails[K];

    constructor(kind: K, details: PublishErrorDetails[K], message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PublishError';
        this.kind = kind;
        this.details = details;
    }

    get code(): string {
        return errorCode(this.kind);
    }
}

export function isPublishError<K extends PublishErrorKind>(err: unknown, kind?: K): err is PublishError<K> {
    if (!(err instanceof PublishError)) return false;
    return kind === undefined || err.kind === kind;
}

/** Raised for invalid server configuration, never for client input. */
export class ConfigError extends Error {
    readonly code: string;

    constructor(code: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ConfigError';
        this.code = code;
    }
}
