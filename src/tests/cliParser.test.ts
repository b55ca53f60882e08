import assert from 'assert';
import { describe, it } from 'node:test';
import {
    getOptionValue,
    getPositionalArgs,
    parseBoolStrict,
    parseNullableLimit,
    parseRolePreference,
    parseWorkerRole,
} from '../cli/cliParser';

describe('cliParser', () => {
    it('separa opzioni e argomenti posizionali', () => {
        const args = ['numeri.csv', '--delay', '45', '--destination', 'group-1'];
        assert.equal(getOptionValue(args, '--delay'), '45');
        assert.equal(getOptionValue(args, '--batch'), undefined);
        assert.deepEqual(getPositionalArgs(args), ['numeri.csv']);
    });

    it('interpreta limiti, booleani e ruoli', () => {
        assert.equal(parseNullableLimit('default', '--daily-limit'), null);
        assert.equal(parseNullableLimit(' 40 ', '--daily-limit'), 40);
        assert.throws(() => parseNullableLimit('0', '--daily-limit'), /--daily-limit deve essere >= 1/);
        assert.equal(parseBoolStrict('Yes', '--allow-admin'), true);
        assert.throws(() => parseBoolStrict('forse', '--allow-admin'), /Valore non valido per --allow-admin: forse/);
        assert.equal(parseWorkerRole(undefined), 'USER');
        assert.equal(parseWorkerRole('admin'), 'ADMIN');
        assert.equal(parseRolePreference('user-first'), 'USER_FIRST');
        assert.throws(() => parseRolePreference('random'), /Preferenza ruolo non valida/);
    });
});
