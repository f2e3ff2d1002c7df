/**
 * Breezeway Engine — Error Taxonomy
 *
 * Every failure the engine surfaces carries a stable `code`, which the HTTP
 * layer maps to a status and echoes in `{ error, message }` bodies.
 */

export type ErrorCode =
    | 'UPSTREAM_HTTP'
    | 'UPSTREAM_FORMAT'
    | 'UPSTREAM_NO_DATA'
    | 'INVALID_REQUEST'
    | 'INVALID_DATE'
    | 'DATE_OUT_OF_RANGE'
    | 'INVALID_LOCATION'
    | 'DESTINATION_NOT_FOUND'
    | 'DUPLICATE_POINT'
    | 'TIMEOUT';

export class OutlookError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'OutlookError';
        this.code = code;
    }
}

// =============================================================================
// Upstream
// =============================================================================

/** Network failure or non-2xx status talking to a provider. */
export class TransportError extends OutlookError {
    readonly status?: number;

    constructor(message: string, options?: { status?: number; cause?: unknown }) {
        super('UPSTREAM_HTTP', message, options);
        this.name = 'TransportError';
        this.status = options?.status;
    }
}

/** Provider body did not parse or lacked the expected fields. */
export class DataFormatError extends OutlookError {
    constructor(message: string, options?: { cause?: unknown; code?: ErrorCode }) {
        super(options?.code ?? 'UPSTREAM_FORMAT', message, options);
        this.name = 'DataFormatError';
    }
}

/** The hourly series held no sample at the sampling hour. */
export class NoDataError extends DataFormatError {
    constructor(message: string) {
        super(message, { code: 'UPSTREAM_NO_DATA' });
        this.name = 'NoDataError';
    }
}

// =============================================================================
// Caller Input
// =============================================================================

export class ValidationError extends OutlookError {
    constructor(message: string, code: ErrorCode = 'INVALID_REQUEST') {
        super(code, message);
        this.name = 'ValidationError';
    }
}

export class InvalidDateError extends ValidationError {
    constructor(message = 'invalid travel date format, use YYYY-MM-DD') {
        super(message, 'INVALID_DATE');
        this.name = 'InvalidDateError';
    }
}

export class OutOfRangeError extends ValidationError {
    constructor(message: string) {
        super(message, 'DATE_OUT_OF_RANGE');
        this.name = 'OutOfRangeError';
    }
}

export class UnknownDestinationError extends ValidationError {
    constructor(name: string) {
        super(`destination not found: ${name}`, 'DESTINATION_NOT_FOUND');
        this.name = 'UnknownDestinationError';
    }
}

// =============================================================================
// Deadlines
// =============================================================================

export class TimeoutError extends OutlookError {
    constructor(message = 'deadline exceeded', options?: { cause?: unknown }) {
        super('TIMEOUT', message, options);
        this.name = 'TimeoutError';
    }
}

/**
 * Translate an abort reason into the error a caller should see.
 * Engine errors pass through; anything else (DOMException from
 * AbortSignal.timeout, a bare abort()) becomes a TimeoutError.
 */
export function errorFromAbort(reason: unknown): OutlookError {
    if (reason instanceof OutlookError) return reason;
    return new TimeoutError('deadline exceeded', { cause: reason });
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
