export class AppError extends Error {
    public readonly statusCode: number;
    public readonly code: string;

    constructor(message: string, statusCode = 500, code = 'INTERNAL_ERROR') {
        super(message);
        this.name = new.target.name;
        this.statusCode = statusCode;
        this.code = code;
    }
}

/** Client-fixable input problems. Carries every violated rule, not only the first. */
export class ValidationError extends AppError {
    public readonly details: string[];

    constructor(details: string[] | string) {
        const list = Array.isArray(details) ? details : [details];
        super(`Validation errors: ${list.join('; ')}`, 422, 'VALIDATION_ERROR');
        this.details = list;
    }
}

export class PredictionError extends AppError {
    constructor(message: string) {
        super(message, 500, 'PREDICTION_ERROR');
    }
}

export class NotFoundError extends AppError {
    constructor(message: string) {
        super(message, 404, 'NOT_FOUND');
    }
}

export class AuthenticationError extends AppError {
    constructor(message = 'Could not validate credentials') {
        super(message, 401, 'UNAUTHENTICATED');
    }
}

export class AuthorizationError extends AppError {
    constructor(message = 'Insufficient permissions') {
        super(message, 403, 'FORBIDDEN');
    }
}

export class ConflictError extends AppError {
    constructor(message: string) {
        super(message, 409, 'CONFLICT');
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
