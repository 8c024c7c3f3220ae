export enum RegistryErrorCode {
    NotAuthorized = 100,
    AlreadyRegistered = 101,
    InvalidInput = 102,
    NotRegistered = 103,
    NotVerified = 104,
    AlreadyVerified = 105,
    InvalidStatus = 106,
}

export enum PracticeLogErrorCode {
    NotAuthorized = 200,
    NotVerified = 202,
    InvalidInput = 203,
    LogNotFound = 204,
    AlreadyModerated = 205,
}

export enum TransferErrorCode {
    InsufficientFunds = 1,
    SenderIsRecipient = 2,
    NonPositiveAmount = 3,
}

export type ErrorCode = RegistryErrorCode | PracticeLogErrorCode | TransferErrorCode;

/** Outcome of a mutating operation: a value or exactly one error code. */
export type Result<T, E extends ErrorCode> =
    | { ok: true; value: T }
    | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
    return { ok: true, value };
}

export function fail<E extends ErrorCode>(error: E): { ok: false; error: E } {
    return { ok: false, error };
}

export function errorName(code: ErrorCode): string {
    return RegistryErrorCode[code] ?? PracticeLogErrorCode[code] ?? TransferErrorCode[code] ?? 'Unknown';
}

/**
 * Thrown by the contracts so the peer rejects the transaction and drops its
 * write set. The message starts with the numeric code for clients that only
 * see the error string.
 */
export class ContractError extends Error {
    constructor(readonly code: ErrorCode) {
        super(`${code} ${errorName(code)}`);
        this.name = 'ContractError';
    }
}
