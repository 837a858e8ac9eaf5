/**
 * Error categories for classification
 */
export enum ErrorCategory {
    RECOVERABLE = "RECOVERABLE", // Caller may continue with the next track
    TRANSIENT = "TRANSIENT", // Temporary issue, will resolve
    FATAL = "FATAL", // Cannot continue
}

/**
 * Error codes for specific error types
 */
export enum ErrorCode {
    // Configuration errors
    INVALID_CONFIG = "INVALID_CONFIG",

    // Upstream contract errors
    MALFORMED_SEARCH_RESPONSE = "MALFORMED_SEARCH_RESPONSE",

    // Pending queue errors
    PENDING_QUEUE_UNAVAILABLE = "PENDING_QUEUE_UNAVAILABLE",

    // File system errors
    FILE_NOT_FOUND = "FILE_NOT_FOUND",
    FILE_READ_ERROR = "FILE_READ_ERROR",
    DISK_FULL = "DISK_FULL",
    PERMISSION_DENIED = "PERMISSION_DENIED",

    // Metadata errors
    METADATA_PARSE_ERROR = "METADATA_PARSE_ERROR",
}

export class AppError extends Error {
    constructor(
        public code: ErrorCode,
        public category: ErrorCategory,
        message: string,
        public details?: Record<string, unknown>
    ) {
        super(message);
        this.name = "AppError";
        Object.setPrototypeOf(this, AppError.prototype);
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            category: this.category,
            message: this.message,
            details: this.details,
        };
    }
}

export function isRecoverable(error: unknown): boolean {
    return error instanceof AppError && error.category === ErrorCategory.RECOVERABLE;
}

export function isTransient(error: unknown): boolean {
    return error instanceof AppError && error.category === ErrorCategory.TRANSIENT;
}

function readErrorCode(err: unknown): string | undefined {
    if (typeof err === "object" && err !== null && "code" in err) {
        const { code } = err;
        return typeof code === "string" ? code : undefined;
    }
    return undefined;
}

function readErrorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Wrap a Node.js filesystem error in an AppError
 */
export function wrapNodeError(err: unknown, context: string): AppError {
    const code = readErrorCode(err);
    const details = { originalError: readErrorMessage(err) };

    if (code === "ENOENT") {
        return new AppError(
            ErrorCode.FILE_NOT_FOUND,
            ErrorCategory.RECOVERABLE,
            `File not found: ${context}`,
            details
        );
    }

    if (code === "EACCES" || code === "EPERM") {
        return new AppError(
            ErrorCode.PERMISSION_DENIED,
            ErrorCategory.FATAL,
            `Permission denied: ${context}`,
            details
        );
    }

    if (code === "ENOSPC") {
        return new AppError(
            ErrorCode.DISK_FULL,
            ErrorCategory.TRANSIENT,
            `Disk full: ${context}`,
            details
        );
    }

    return new AppError(
        ErrorCode.FILE_READ_ERROR,
        ErrorCategory.RECOVERABLE,
        `Filesystem operation failed: ${context}`,
        details
    );
}
