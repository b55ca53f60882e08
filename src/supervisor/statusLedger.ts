import { SupervisorStore } from '../core/repositories.types';
import { AddMemberResult } from '../platform/capability';
import { IdentifierRecord, IdentifierStatus, IdentifierStatusCounts } from '../types/domain';
import { IdentifierTransitionError } from './errors';

const allowedTransitions: Record<IdentifierStatus, IdentifierStatus[]> = {
    PENDING: ['ADDED', 'FAILED', 'BLACKLISTED'],
    FAILED: ['PENDING'],
    ADDED: [],
    BLACKLISTED: [],
};

export function isValidIdentifierTransition(from: IdentifierStatus, to: IdentifierStatus): boolean {
    return allowedTransitions[from].includes(to);
}

function assertTransition(record: IdentifierRecord, to: IdentifierStatus): void {
    if (!isValidIdentifierTransition(record.status, to)) {
        throw new IdentifierTransitionError(record.id, record.status, to);
    }
}

export interface LedgerOutcome {
    identifier: IdentifierRecord;
    /** L'esito conta come identificativo processato (contatori run). */
    processed: boolean;
    success: boolean;
}

/**
 * Macchina a stati degli identificativi e coda FIFO per id.
 * I claim sono in memoria: tengono fuori dalla coda gli identificativi con un tentativo in volo.
 */
export class StatusLedger {
    private readonly claimed = new Set<number>();

    constructor(
        private readonly store: SupervisorStore,
        private readonly retryLimit: number
    ) {}

    async nextPending(): Promise<IdentifierRecord | null> {
        const candidates = await this.store.listIdentifiersByStatus('PENDING', this.claimed.size + 1);
        return candidates.find((candidate) => !this.claimed.has(candidate.id)) ?? null;
    }

    claim(identifierId: number): boolean {
        if (this.claimed.has(identifierId)) return false;
        this.claimed.add(identifierId);
        return true;
    }

    release(identifierId: number): void {
        this.claimed.delete(identifierId);
    }

    isClaimed(identifierId: number): boolean {
        return this.claimed.has(identifierId);
    }

    counts(): Promise<IdentifierStatusCounts> {
        return this.store.countIdentifiersByStatus();
    }

    async recordOutcome(identifier: IdentifierRecord, result: AddMemberResult, now: Date): Promise<LedgerOutcome> {
        const nowIso = now.toISOString();
        const next: IdentifierRecord = { ...identifier, last_attempt_at: nowIso, updated_at: nowIso };
        let processed = true;
        let success = false;

        switch (result.kind) {
            case 'OK':
                assertTransition(identifier, 'ADDED');
                next.status = 'ADDED';
                next.attempt_count += 1;
                next.last_error = null;
                success = true;
                break;
            case 'PRIVACY_RESTRICTED':
                assertTransition(identifier, 'BLACKLISTED');
                next.status = 'BLACKLISTED';
                next.attempt_count += 1;
                next.last_error = 'PRIVACY_RESTRICTED';
                break;
            case 'UNKNOWN': {
                assertTransition(identifier, 'FAILED');
                next.attempt_count += 1;
                next.last_error = result.detail;
                const failed: IdentifierRecord = { ...next, status: 'FAILED' };
                if (next.attempt_count < this.retryLimit) {
                    assertTransition(failed, 'PENDING');
                    next.status = 'PENDING';
                } else {
                    next.status = 'FAILED';
                }
                break;
            }
            case 'RATE_LIMITED':
                next.last_error = `RATE_LIMITED(${result.waitSeconds}s)`;
                processed = false;
                break;
            case 'INVALID_SESSION':
                next.last_error = 'INVALID_SESSION';
                processed = false;
                break;
        }

        await this.store.saveIdentifier(next);
        this.release(identifier.id);
        return { identifier: next, processed, success };
    }

    requeueFailed(now: Date): Promise<number> {
        return this.store.requeueFailedIdentifiers(now.toISOString());
    }
}
