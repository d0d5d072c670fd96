/**
 * Structured errors for the escalation engine
 *
 * Every failure the engine can raise carries a machine-readable code and a
 * severity. The severity decides propagation: FATAL and ERROR abort the
 * current CLI invocation (unless the caller is a read-modify-write operation,
 * which downgrades checkpoint I/O to a warning), WARNING is logged and
 * swallowed.
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export const ERRORS = {
    CONFIG_ERROR: 'CONFIG_ERROR',
    CHECKPOINT_IO_ERROR: 'CHECKPOINT_IO_ERROR',
    CHAIN_NOT_FOUND: 'CHAIN_NOT_FOUND',
    CHAIN_EXISTS: 'CHAIN_EXISTS',
    LEVEL_OUT_OF_RANGE: 'LEVEL_OUT_OF_RANGE',
    INVALID_ARGUMENT: 'INVALID_ARGUMENT',
    SCHEDULER_QUERY_ERROR: 'SCHEDULER_QUERY_ERROR',
    CODEC_INPUT_ERROR: 'CODEC_INPUT_ERROR',
    AUDIT_WRITE_ERROR: 'AUDIT_WRITE_ERROR',
} as const;

export type ErrorCode = typeof ERRORS[keyof typeof ERRORS];

export type Severity = 'FATAL' | 'ERROR' | 'WARNING';

export interface StructuredError {
    code: ErrorCode;
    message: string;
    severity: Severity;
    context: Record<string, unknown>;
    timestamp: string;
}

/* -------------------------------------------------------------------------- */
/* Severity                                                                   */
/* -------------------------------------------------------------------------- */

const FATAL_CODES: ErrorCode[] = [
    ERRORS.CONFIG_ERROR,
    ERRORS.LEVEL_OUT_OF_RANGE,
];

const WARNING_CODES: ErrorCode[] = [
    ERRORS.SCHEDULER_QUERY_ERROR,
    ERRORS.AUDIT_WRITE_ERROR,
];

export function getSeverity(code: ErrorCode): Severity {
    if (FATAL_CODES.includes(code)) return 'FATAL';
    if (WARNING_CODES.includes(code)) return 'WARNING';
    return 'ERROR';
}

/* -------------------------------------------------------------------------- */
/* Error class                                                                */
/* -------------------------------------------------------------------------- */

export class EscalationError extends Error {
    readonly severity: Severity;

    constructor(
        message: string,
        public readonly code: ErrorCode,
        public readonly context: Record<string, unknown> = {},
        public readonly cause?: unknown
    ) {
        super(message);
        this.name = 'EscalationError';
        this.severity = getSeverity(code);
    }

    toStructured(): StructuredError {
        return {
            code: this.code,
            message: this.message,
            severity: this.severity,
            context: this.context,
            timestamp: new Date().toISOString(),
        };
    }
}

export function isEscalationError(e: unknown, code?: ErrorCode): e is EscalationError {
    return e instanceof EscalationError && (code === undefined || e.code === code);
}

export function describeError(e: unknown): string {
    if (e instanceof Error) return e.message;
    return String(e);
}

/* -------------------------------------------------------------------------- */
/* Error Factory Methods                                                      */
/* -------------------------------------------------------------------------- */

export class ErrorFactory {
    static config(message: string, context: Record<string, unknown> = {}, cause?: unknown): EscalationError {
        return new EscalationError(`Invalid configuration: ${message}`, ERRORS.CONFIG_ERROR, context, cause);
    }

    static checkpointIo(path: string, operation: 'read' | 'write' | 'validate', cause: unknown): EscalationError {
        return new EscalationError(
            `Checkpoint ${operation} failed for ${path}: ${describeError(cause)}`,
            ERRORS.CHECKPOINT_IO_ERROR,
            { path, operation },
            cause
        );
    }

    static chainNotFound(chainId: string): EscalationError {
        return new EscalationError(`Chain not found: ${chainId}`, ERRORS.CHAIN_NOT_FOUND, { chain_id: chainId });
    }

    static chainExists(chainId: string): EscalationError {
        return new EscalationError(`Chain already exists: ${chainId}`, ERRORS.CHAIN_EXISTS, { chain_id: chainId });
    }

    static levelOutOfRange(chainId: string, level: number, maxLevel: number): EscalationError {
        return new EscalationError(
            `Level ${level} is outside the ladder 0..${maxLevel} of chain ${chainId}`,
            ERRORS.LEVEL_OUT_OF_RANGE,
            { chain_id: chainId, level, max_level: maxLevel }
        );
    }

    static invalidArgument(message: string, context: Record<string, unknown> = {}): EscalationError {
        return new EscalationError(message, ERRORS.INVALID_ARGUMENT, context);
    }

    static schedulerQuery(command: string, reason: string, cause?: unknown): EscalationError {
        return new EscalationError(
            `Scheduler query failed (${command}): ${reason}`,
            ERRORS.SCHEDULER_QUERY_ERROR,
            { command },
            cause
        );
    }

    static codecInput(token: string, reason: string): EscalationError {
        return new EscalationError(
            `Malformed index spec token "${token}": ${reason}`,
            ERRORS.CODEC_INPUT_ERROR,
            { token }
        );
    }

    static auditWrite(operation: string, cause: unknown): EscalationError {
        return new EscalationError(
            `Audit write failed (${operation}): ${describeError(cause)}`,
            ERRORS.AUDIT_WRITE_ERROR,
            { operation },
            cause
        );
    }
}
