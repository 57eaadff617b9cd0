/**
 * Error taxonomy for the reconciliation service.
 * Every error a request can surface carries a stable `code`;
 * the transport maps codes to status lines, never messages.
 */

export type ReconciliationErrorCode =
    | 'UNSUPPORTED_NUMBER_FORMAT'
    | 'BAD_RANGE_FORMAT'
    | 'RANGE_END_BEFORE_START'
    | 'RANGE_TOO_LARGE'
    | 'INVALID_REQUEST'
    | 'STORE_CONNECTION_MISSING'
    | 'STORE_OPERATION_FAILED';

export type StoreName = 'numbers' | 'routing-cache' | 'provisioning';

export class ReconciliationError extends Error {
    constructor(message: string, public readonly code: ReconciliationErrorCode) {
        super(message);
        this.name = 'ReconciliationError';
    }
}

/**
 * Raised while reading caller input. No store has been touched when one of these is thrown.
 */
export class InputValidationError extends ReconciliationError {
    constructor(message: string, code: ReconciliationErrorCode) {
        super(message, code);
        this.name = 'InputValidationError';
    }
}

export class UnsupportedNumberFormatError extends InputValidationError {
    constructor(public readonly raw: string) {
        super(`Unsupported number format: ${raw}`, 'UNSUPPORTED_NUMBER_FORMAT');
        this.name = 'UnsupportedNumberFormatError';
    }
}

export class BadRangeFormatError extends InputValidationError {
    constructor() {
        super('Bad range format', 'BAD_RANGE_FORMAT');
        this.name = 'BadRangeFormatError';
    }
}

export class RangeEndBeforeStartError extends InputValidationError {
    constructor() {
        super('Range end < start', 'RANGE_END_BEFORE_START');
        this.name = 'RangeEndBeforeStartError';
    }
}

export class RangeTooLargeError extends InputValidationError {
    constructor(public readonly maxSpan: number, public readonly span: bigint) {
        super(`Range too large (>${maxSpan})`, 'RANGE_TOO_LARGE');
        this.name = 'RangeTooLargeError';
    }
}

export class InvalidRequestError extends InputValidationError {
    constructor(message: string) {
        super(message, 'INVALID_REQUEST');
        this.name = 'InvalidRequestError';
    }
}

export class StoreConnectionMissingError extends ReconciliationError {
    constructor(public readonly store: StoreName, public readonly settings: string) {
        super(`${settings} missing`, 'STORE_CONNECTION_MISSING');
        this.name = 'StoreConnectionMissingError';
    }
}

export class StoreOperationFailedError extends ReconciliationError {
    constructor(public readonly store: StoreName, public readonly original: unknown) {
        super(`${store} operation failed: ${errorMessage(original)}`, 'STORE_OPERATION_FAILED');
        this.name = 'StoreOperationFailedError';
    }
}

/**
 * Wraps a driver error for `store`. Errors already in the taxonomy pass through untouched.
 */
export function toStoreFailure(store: StoreName, error: unknown): ReconciliationError {
    if (error instanceof ReconciliationError) {
        return error;
    }
    return new StoreOperationFailedError(store, error);
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
