/**
 * identifierCommands.ts — Comandi CLI sulla coda identificativi
 *
 * import, stats, requeue-failed
 */

import { SupervisorStore } from '../../core/repositories.types';
import { importIdentifiersFromCSV } from '../../csvImporter';
import { computePercentComplete } from '../../supervisor/supervisor';
import { getOptionValue, getPositionalArgs } from '../cliParser';

export async function runImportCommand(store: SupervisorStore, args: string[]): Promise<void> {
    const filePath = getOptionValue(args, '--file') ?? getPositionalArgs(args)[0];
    if (!filePath) {
        throw new Error('Specifica il CSV: npm start -- import --file path/to/numeri.csv');
    }
    const result = await importIdentifiersFromCSV(store, filePath);
    console.log(`Import completato. Trovati=${result.found}, Inseriti=${result.inserted}, Già presenti=${result.skipped}`);
}

export async function runStatsCommand(store: SupervisorStore): Promise<void> {
    const counts = await store.countIdentifiersByStatus();
    console.log(JSON.stringify({ ...counts, percentComplete: computePercentComplete(counts) }, null, 2));
}

export async function runRequeueFailedCommand(store: SupervisorStore): Promise<void> {
    const requeued = await store.requeueFailedIdentifiers(new Date().toISOString());
    console.log(`Identificativi FAILED riaccodati: ${requeued}`);
}
