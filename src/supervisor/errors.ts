import { IdentifierStatus } from '../types/domain';

export class RunConfigurationError extends Error {
    readonly errors: string[];

    constructor(errors: string[]) {
        super(`Configurazione run non valida: ${errors.join('; ')}`);
        this.name = 'RunConfigurationError';
        this.errors = errors;
    }
}

export class RunConflictError extends Error {
    readonly activeRunId: string;

    constructor(activeRunId: string) {
        super(`Esiste già una run attiva: ${activeRunId}`);
        this.name = 'RunConflictError';
        this.activeRunId = activeRunId;
    }
}

export class RunNotFoundError extends Error {
    constructor(runId: string) {
        super(`Run non trovata: ${runId}`);
        this.name = 'RunNotFoundError';
    }
}

/**
 * Guasto sistemico della piattaforma (rete giù, destinazione inesistente):
 * non è attribuibile a un identificativo o a un worker e ferma la run.
 */
export class PlatformUnavailableError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'PlatformUnavailableError';
    }
}

export class IdentifierTransitionError extends Error {
    constructor(identifierId: number, from: IdentifierStatus, to: IdentifierStatus) {
        super(`Transizione non valida per identificativo ${identifierId}: ${from} -> ${to}`);
        this.name = 'IdentifierTransitionError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
