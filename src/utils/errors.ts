/**
 * 🚨 ERROR TAXONOMY
 * Only ScoringInconsistencyError, InvalidTransitionError and the input/config
 * errors are ever thrown across a component boundary. Blocks, network failures
 * and parse failures travel as classified outcomes.
 */

export class DirectoryDiscoveryError extends Error {
    constructor(message: string, public code: string, public context?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

export class ParseFailureError extends DirectoryDiscoveryError {
    constructor(siteId: string, cause: string) {
        super(`Result markup for ${siteId} could not be parsed: ${cause}`, 'PARSE_FAILURE', { siteId });
    }
}

export class SoftBlockError extends DirectoryDiscoveryError {
    constructor(siteId: string, signal: string) {
        super(`Soft block on ${siteId} (${signal})`, 'SOFT_BLOCK', { siteId, signal });
    }
}

export class HardBlockError extends DirectoryDiscoveryError {
    constructor(siteId: string, detail: string) {
        super(`Hard block on ${siteId}: ${detail}`, 'HARD_BLOCK', { siteId });
    }
}

export class NetworkFailureError extends DirectoryDiscoveryError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'NETWORK_FAILURE', context);
    }
}

export class ScoringInconsistencyError extends DirectoryDiscoveryError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'SCORING_INCONSISTENCY', { ...context, fatal: true });
    }
}

export class InvalidTransitionError extends DirectoryDiscoveryError {
    constructor(public from: string, public event: string, reason?: string) {
        super(`Transition "${event}" is not allowed from "${from}"${reason ? `: ${reason}` : ''}`, 'INVALID_TRANSITION', {
            from,
            event,
        });
    }
}

export class RecordNotFoundError extends DirectoryDiscoveryError {
    constructor(kind: string, id: string) {
        super(`${kind} not found: ${id}`, 'NOT_FOUND', { kind, id });
    }
}

export class ConfigurationError extends DirectoryDiscoveryError {
    constructor(message: string) {
        super(message, 'CONFIG_ERROR', { fatal: true });
    }
}

export class IdentityValidationError extends DirectoryDiscoveryError {
    constructor(message: string) {
        super(message, 'IDENTITY_VALIDATION_ERROR', { fatal: false });
    }
}

export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
