import assert from 'assert';
import { describe, it } from 'node:test';
import { maskPhoneNumber, sanitizeForLogs } from '../security/redaction';

describe('maskPhoneNumber', () => {
    it('lascia visibili solo le ultime tre cifre', () => {
        assert.equal(maskPhoneNumber('+393331234567'), '+*********567');
        assert.equal(maskPhoneNumber(' 3331234567 '), '*******567');
        assert.equal(maskPhoneNumber('+12'), '+12');
    });
});

describe('sanitizeForLogs', () => {
    it('oscura le chiavi sensibili e maschera i numeri', () => {
        const sanitized = sanitizeForLogs({
            apiKey: 'test-secret',
            workerName: 'w1',
            identifier: '+393331234567',
            nested: { sessionString: 'test-session', attempts: 2 },
            note: 'numero 3331234567 fallito',
            list: ['+393337654321', 4],
        });
        assert.deepEqual(sanitized, {
            apiKey: '[REDACTED]',
            workerName: 'w1',
            identifier: '+*********567',
            nested: { sessionString: '[REDACTED]', attempts: 2 },
            note: 'numero *******567 fallito',
            list: ['+*********321', 4],
        });
    });

    it('converte date ed errori in stringhe', () => {
        const sanitized = sanitizeForLogs({
            at: new Date('2026-03-10T10:00:00.000Z'),
            error: new Error('numero +393331234567 rifiutato'),
        });
        assert.deepEqual(sanitized, {
            at: '2026-03-10T10:00:00.000Z',
            error: 'numero +*********567 rifiutato',
        });
    });
});
