import fs from 'fs';
import csv from 'csv-parser';
import { SupervisorStore } from './core/repositories.types';

export interface ImportResult {
    /** Valori riconosciuti nel file (dopo la deduplica interna). */
    found: number;
    inserted: number;
    skipped: number;
}

/**
 * Normalizza una cella candidata: spazi, trattini e parentesi di formattazione vengono tolti.
 * Sono presi solo i valori che iniziano con `+` (numero in formato internazionale);
 * il resto della cella (intestazioni, nomi, note) viene ignorato.
 */
export function normalizeIdentifierCandidate(raw: string): string | null {
    const compact = raw.trim().replace(/[\s\-().]/g, '');
    if (!compact.startsWith('+') || compact.length < 2) {
        return null;
    }
    return compact;
}

/** Estrae i numeri da un testo libero, uno per riga (import da textarea/API). */
export function extractIdentifiersFromText(text: string): string[] {
    const values: string[] = [];
    const seen = new Set<string>();
    for (const line of text.split(/\r?\n/)) {
        const normalized = normalizeIdentifierCandidate(line);
        if (normalized && !seen.has(normalized)) {
            seen.add(normalized);
            values.push(normalized);
        }
    }
    return values;
}

/** Legge tutte le celle del CSV, qualunque colonna: l'intestazione è facoltativa. */
export async function readIdentifiersFromCSV(filePath: string): Promise<string[]> {
    const values: string[] = [];
    const seen = new Set<string>();

    await new Promise<void>((resolve, reject) => {
        fs.createReadStream(filePath)
            .on('error', reject)
            .pipe(csv({ headers: false }))
            .on('data', (row: Record<string, string>) => {
                for (const cell of Object.values(row)) {
                    const normalized = normalizeIdentifierCandidate(cell);
                    if (normalized && !seen.has(normalized)) {
                        seen.add(normalized);
                        values.push(normalized);
                    }
                }
            })
            .on('end', resolve)
            .on('error', reject);
    });

    return values;
}

export async function importIdentifierValues(
    store: SupervisorStore,
    values: string[],
    now: Date = new Date()
): Promise<ImportResult> {
    const result = await store.insertIdentifiers(values, now.toISOString());
    return { found: values.length, inserted: result.inserted, skipped: result.skipped };
}

export async function importIdentifiersFromCSV(
    store: SupervisorStore,
    filePath: string,
    now: Date = new Date()
): Promise<ImportResult> {
    const values = await readIdentifiersFromCSV(filePath);
    return importIdentifierValues(store, values, now);
}
