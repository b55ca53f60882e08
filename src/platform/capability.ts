import { WorkerRecord } from '../types/domain';

export { PlatformUnavailableError } from '../supervisor/errors';

/** Esito di un singolo tentativo di aggiunta. Unione chiusa: il supervisor gestisce ogni caso. */
export type AddMemberResult =
    | { kind: 'OK' }
    | { kind: 'RATE_LIMITED'; waitSeconds: number }
    | { kind: 'PRIVACY_RESTRICTED' }
    | { kind: 'INVALID_SESSION' }
    | { kind: 'UNKNOWN'; detail: string };

export type JoinResult =
    | { kind: 'JOINED' }
    | { kind: 'ALREADY_MEMBER' }
    | { kind: 'FORBIDDEN'; detail?: string }
    | { kind: 'NOT_FOUND' };

export type WorkerHealthProbe = 'ACTIVE' | 'DISCONNECTED';

/**
 * Confine verso la libreria client della piattaforma di messaggistica.
 * Le implementazioni lanciano `PlatformUnavailableError` solo per guasti sistemici;
 * ogni altro esito va restituito come valore.
 */
export interface PlatformCapability {
    joinDestination(worker: WorkerRecord, destinationId: string): Promise<JoinResult>;
    addMember(worker: WorkerRecord, destinationId: string, identifier: string, message?: string): Promise<AddMemberResult>;
    getWorkerHealth(worker: WorkerRecord): Promise<WorkerHealthProbe>;
}

export function describeAddMemberResult(result: AddMemberResult): string {
    switch (result.kind) {
        case 'OK':
            return 'OK';
        case 'RATE_LIMITED':
            return `RATE_LIMITED(${result.waitSeconds}s)`;
        case 'PRIVACY_RESTRICTED':
            return 'PRIVACY_RESTRICTED';
        case 'INVALID_SESSION':
            return 'INVALID_SESSION';
        case 'UNKNOWN':
            return `UNKNOWN(${result.detail})`;
    }
}
