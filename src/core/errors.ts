export type ErrorKind = 'transient' | 'permanent'

export class IncidentTrailError extends Error {
    readonly kind: ErrorKind

    constructor(message: string, kind: ErrorKind, options?: ErrorOptions) {
        super(message, options)
        this.name = 'IncidentTrailError'
        this.kind = kind
    }
}

export class ValidationError extends IncidentTrailError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'permanent', options)
        this.name = 'ValidationError'
    }
}

export class NotFoundError extends IncidentTrailError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'permanent', options)
        this.name = 'NotFoundError'
    }
}

/** The session is already in a terminal state. */
export class ConflictError extends IncidentTrailError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'permanent', options)
        this.name = 'ConflictError'
    }
}

export class ThrottledError extends IncidentTrailError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'transient', options)
        this.name = 'ThrottledError'
    }
}

export class TransientError extends IncidentTrailError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'transient', options)
        this.name = 'TransientError'
    }
}

/** A response came back without a field the client needs. */
export class MalformedResponseError extends IncidentTrailError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'transient', options)
        this.name = 'MalformedResponseError'
    }
}

export class ConfigError extends IncidentTrailError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'permanent', options)
        this.name = 'ConfigError'
    }
}

export type RecorderFailure = 'no-invocation-id' | 'invocation-failed' | 'step-write-failed'

export class RecorderError extends IncidentTrailError {
    readonly reason: RecorderFailure
    readonly invocationId?: string

    constructor(reason: RecorderFailure, message: string, options?: ErrorOptions & { invocationId?: string }) {
        super(message, 'permanent', options)
        this.name = 'RecorderError'
        this.reason = reason
        this.invocationId = options?.invocationId
    }
}

const SERVICE_EXCEPTIONS: Record<string, (message: string, cause: unknown) => IncidentTrailError> = {
    ResourceNotFoundException: (message, cause) => new NotFoundError(message, { cause }),
    ConflictException: (message, cause) => new ConflictError(message, { cause }),
    ValidationException: (message, cause) => new ValidationError(message, { cause }),
    ThrottlingException: (message, cause) => new ThrottledError(message, { cause }),
    ServiceQuotaExceededException: (message, cause) => new ThrottledError(message, { cause }),
}

/**
 * Maps a service exception onto the client's error taxonomy. Exceptions are matched by
 * name so the mapping works for any SDK error class carrying the service error code.
 */
export function classifyGatewayError(error: unknown): IncidentTrailError {
    if (error instanceof IncidentTrailError) return error
    const message = errorMessage(error)
    if (error instanceof Error) {
        const build = SERVICE_EXCEPTIONS[error.name]
        if (build) return build(message, error)
    }
    return new TransientError(message, { cause: error })
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}
