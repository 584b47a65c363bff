export type RemoteTransferErrorCode =
    | 'INVALID_ARGUMENT'
    | 'UNSUPPORTED'
    | 'REMOTE_OPERATION_FAILED'
    | 'LOCAL_IO_FAILED'
    | 'CONFIG_INVALID';

/**
 * Base class for every error raised by the transfer client
 */
export class RemoteTransferError extends Error {
    readonly code: RemoteTransferErrorCode;

    constructor(code: RemoteTransferErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'RemoteTransferError';
        this.code = code;
    }
}

/**
 * A required argument was missing, empty or malformed. Raised before any I/O.
 */
export class InvalidArgumentError extends RemoteTransferError {
    readonly argument: string;

    constructor(argument: string, message = `Argument '${argument}' is required`) {
        super('INVALID_ARGUMENT', message);
        this.name = 'InvalidArgumentError';
        this.argument = argument;
    }
}

/**
 * The requested operation has no implementation (recursive directory transfer)
 */
export class UnsupportedOperationError extends RemoteTransferError {
    constructor(message: string) {
        super('UNSUPPORTED', message);
        this.name = 'UnsupportedOperationError';
    }
}

/**
 * The protocol library failed. `status` is the FTP reply code or the SFTP library code when one was reported.
 */
export class RemoteOperationError extends RemoteTransferError {
    readonly status?: number | string;

    constructor(message: string, status?: number | string, cause?: unknown) {
        super('REMOTE_OPERATION_FAILED', message, { cause });
        this.name = 'RemoteOperationError';
        this.status = status;
    }
}

export class LocalIoError extends RemoteTransferError {
    readonly path: string;

    constructor(filePath: string, message: string, cause?: unknown) {
        super('LOCAL_IO_FAILED', message, { cause });
        this.name = 'LocalIoError';
        this.path = filePath;
    }
}

export class ConfigError extends RemoteTransferError {
    constructor(message: string) {
        super('CONFIG_INVALID', message);
        this.name = 'ConfigError';
    }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
