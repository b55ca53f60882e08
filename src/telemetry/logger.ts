import { config } from '../config';
import { sanitizeForLogs } from '../security/redaction';
import { LogLevel } from '../types/domain';
import { getCorrelationId, getRunContextId } from './correlation';
import { publishLiveEvent } from './liveEvents';
import type { LogLevelSetting } from '../config';

export type RunLogSink = (entry: {
    runId: string | null;
    level: LogLevel;
    event: string;
    payload: Record<string, unknown>;
}) => Promise<void>;

const SETTING_WEIGHT: Record<LogLevelSetting, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

const LEVEL_WEIGHT: Record<LogLevel, number> = {
    DEBUG: 10,
    INFO: 20,
    WARN: 30,
    ERROR: 40,
};

let consoleLevel: LogLevelSetting = config.logLevel;
let runLogSink: RunLogSink | null = null;

export function setLogLevel(level: LogLevelSetting): void {
    consoleLevel = level;
}

/**
 * Registra la destinazione persistente dei log (tabella run_logs).
 * Senza sink i log restano su console + live events.
 */
export function setRunLogSink(sink: RunLogSink | null): void {
    runLogSink = sink;
}

function shouldPrint(level: LogLevel): boolean {
    return LEVEL_WEIGHT[level] >= SETTING_WEIGHT[consoleLevel];
}

async function writeLog(level: LogLevel, event: string, payload: Record<string, unknown>): Promise<void> {
    const safePayload = sanitizeForLogs(payload);
    const runId = getRunContextId();
    if (shouldPrint(level)) {
        // fuori da una run (richieste API) la riga porta l'id di correlazione della richiesta
        const correlationId = runId ? null : getCorrelationId();
        const line = correlationId ? `[${level}] ${event} cid=${correlationId}` : `[${level}] ${event}`;
        if (level === 'ERROR') {
            console.error(line, safePayload);
        } else if (level === 'WARN') {
            console.warn(line, safePayload);
        } else {
            console.log(line, safePayload);
        }
    }
    if (runLogSink && level !== 'DEBUG') {
        try {
            await runLogSink({ runId, level, event, payload: safePayload });
        } catch (error) {
            // Il log persistente non deve trascinare giù il chiamante: resta la traccia su stderr.
            console.error(`[ERROR] logger.sink_failed ${event}`, error instanceof Error ? error.message : String(error));
        }
    }
    publishLiveEvent('run.log', { level, event, runId, payload: safePayload });
}

export async function logDebug(event: string, payload: Record<string, unknown> = {}): Promise<void> {
    await writeLog('DEBUG', event, payload);
}

export async function logInfo(event: string, payload: Record<string, unknown> = {}): Promise<void> {
    await writeLog('INFO', event, payload);
}

export async function logWarn(event: string, payload: Record<string, unknown> = {}): Promise<void> {
    await writeLog('WARN', event, payload);
}

export async function logError(event: string, payload: Record<string, unknown> = {}): Promise<void> {
    await writeLog('ERROR', event, payload);
}
