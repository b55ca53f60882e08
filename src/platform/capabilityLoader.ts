/**
 * capabilityLoader.ts — Caricamento del modulo client della piattaforma
 *
 * Policy:
 * - path del modulo da PLATFORM_CAPABILITY_MODULE (relativo alla cwd)
 * - niente symlink, niente file scrivibili da gruppo/altri
 * - integrity hash sha256 opzionale (PLATFORM_CAPABILITY_SHA256)
 * - il modulo esporta `createCapability()` oppure un oggetto capability come default
 */

import fs from 'fs';
import path from 'path';
import { createHash } from 'crypto';
import { config } from '../config';
import { isWritableByOthers } from '../security/filesystem';
import { logInfo } from '../telemetry/logger';
import { PlatformCapability } from './capability';

export interface CapabilityModuleOptions {
    modulePath: string;
    integritySha256?: string;
}

export function isPlatformCapability(value: unknown): value is PlatformCapability {
    if (!value || typeof value !== 'object') return false;
    return 'joinDestination' in value && typeof value.joinDestination === 'function'
        && 'addMember' in value && typeof value.addMember === 'function'
        && 'getWorkerHealth' in value && typeof value.getWorkerHealth === 'function';
}

function verifyIntegrity(filePath: string, expectedSha256: string): boolean {
    const digest = createHash('sha256').update(fs.readFileSync(filePath)).digest('hex');
    return digest === expectedSha256.toLowerCase();
}

async function resolveExport(loaded: unknown): Promise<PlatformCapability> {
    if (isPlatformCapability(loaded)) return loaded;
    if (loaded && typeof loaded === 'object') {
        if ('createCapability' in loaded && typeof loaded.createCapability === 'function') {
            const created: unknown = await loaded.createCapability();
            if (isPlatformCapability(created)) return created;
        }
        if ('default' in loaded && isPlatformCapability(loaded.default)) {
            return loaded.default;
        }
    }
    throw new Error('Il modulo non esporta una PlatformCapability (joinDestination, addMember, getWorkerHealth).');
}

export async function loadCapabilityModule(options: CapabilityModuleOptions): Promise<PlatformCapability> {
    const resolved = path.resolve(process.cwd(), options.modulePath);
    if (!fs.existsSync(resolved)) {
        throw new Error(`Modulo piattaforma non trovato: ${resolved}`);
    }
    if (fs.lstatSync(resolved).isSymbolicLink()) {
        throw new Error(`Modulo piattaforma rifiutato (symlink): ${resolved}`);
    }
    if (isWritableByOthers(resolved)) {
        throw new Error(`Modulo piattaforma rifiutato (permessi troppo aperti): ${resolved}`);
    }
    if (options.integritySha256 && !verifyIntegrity(resolved, options.integritySha256)) {
        throw new Error(`Modulo piattaforma rifiutato (sha256 non corrispondente): ${resolved}`);
    }

    const loaded: unknown = require(resolved);
    const capability = await resolveExport(loaded);
    await logInfo('platform.capability_loaded', {
        modulePath: resolved,
        integrityChecked: !!options.integritySha256,
    });
    return capability;
}

export async function loadConfiguredCapability(): Promise<PlatformCapability> {
    if (!config.platformCapabilityModule) {
        throw new Error('PLATFORM_CAPABILITY_MODULE non configurato: usa --dry-run oppure indica il modulo client.');
    }
    return loadCapabilityModule({
        modulePath: config.platformCapabilityModule,
        integritySha256: config.platformCapabilitySha256 || undefined,
    });
}
