import { closeDatabase } from './db';
import { config } from './config';
import { runDoctor } from './core/doctor';
import { openRuntime, Runtime } from './core/runtime';
import { loadConfiguredCapability } from './platform/capabilityLoader';
import { PlatformCapability } from './platform/capability';
import { RunConfigurationError, RunConflictError } from './supervisor/errors';
import { hasOption } from './cli/cliParser';
import { runImportCommand, runRequeueFailedCommand, runStatsCommand } from './cli/commands/identifierCommands';
import { runAddWorkerCommand, runWorkersCommand } from './cli/commands/workerCommands';
import {
    runRunCommand,
    runRunLogsCommand,
    runRunsCommand,
    runServeCommand,
    runStopRunCommand,
} from './cli/commands/runCommands';

// I comandi lunghi (run, serve) gestiscono SIGINT/SIGTERM da soli fermando la run;
// gli altri chiudono il DB ed escono.
let shuttingDown = false;
function setupGracefulShutdown(command: string | undefined): void {
    if (command === 'run' || command === 'serve') return;
    const handler = async (signal: string): Promise<void> => {
        if (shuttingDown) return;
        shuttingDown = true;
        console.warn(`[SIGNAL] ${signal} ricevuto — chiusura in corso...`);
        await closeDatabase();
        process.exit(0);
    };
    process.on('SIGINT', () => { void handler('SIGINT'); });
    process.on('SIGTERM', () => { void handler('SIGTERM'); });
}

function printHelp(): void {
    console.log('Utilizzo: npm start -- <comando> [opzioni]');
    console.log('Comandi principali:');
    console.log('  import --file <numeri.csv>');
    console.log('  add-worker --name <nome_sessione> [--role admin|user] [--daily-limit <n>|none]');
    console.log('  workers');
    console.log('  stats');
    console.log('  requeue-failed');
    console.log('  run --destination <id_gruppo> [--delay <s>] [--batch <n>] [--daily-limit <n>] [--retry-limit <n>]');
    console.log('      [--message <testo>] [--allow-admin true|false] [--allow-users true|false]');
    console.log('      [--prefer none|user-first|admin-first] [--start-time HH:MM] [--dry-run]');
    console.log('  runs');
    console.log('  stop-run <runId>');
    console.log('  run-logs <runId> [--limit <n>]');
    console.log('  serve [--port <n>] [--dry-run]');
    console.log('  doctor [--no-probe]');
}

async function runDoctorCommand(runtime: Runtime, args: string[]): Promise<void> {
    let capability: PlatformCapability | null = null;
    if (!hasOption(args, '--no-probe') && config.platformCapabilityModule) {
        capability = await loadConfiguredCapability();
    }
    const report = await runDoctor(runtime.db, runtime.store, capability);
    console.log(JSON.stringify(report, null, 2));
    if (!report.dbIntegrityOk || report.configErrors.length > 0) {
        process.exitCode = 1;
    }
}

function describeFatal(error: unknown): string {
    if (error instanceof RunConfigurationError) {
        return `Configurazione run non valida:\n  - ${error.errors.join('\n  - ')}`;
    }
    if (error instanceof RunConflictError) {
        return `${error.message} (run attiva: ${error.activeRunId})`;
    }
    return error instanceof Error ? error.message : String(error);
}

async function main(): Promise<void> {
    const args = process.argv.slice(2);
    const command = args[0];
    const commandArgs = args.slice(1);
    setupGracefulShutdown(command);

    if (!command || command === 'help' || command === '--help') {
        printHelp();
        return;
    }

    const runtime = await openRuntime();

    switch (command) {
        case 'import':
            await runImportCommand(runtime.store, commandArgs);
            break;
        case 'add-worker':
            await runAddWorkerCommand(runtime.store, commandArgs);
            break;
        case 'workers':
            await runWorkersCommand(runtime.store);
            break;
        case 'stats':
            await runStatsCommand(runtime.store);
            break;
        case 'requeue-failed':
            await runRequeueFailedCommand(runtime.store);
            break;
        case 'run':
            await runRunCommand(runtime, commandArgs);
            break;
        case 'runs':
            await runRunsCommand(runtime);
            break;
        case 'stop-run':
            await runStopRunCommand(runtime, commandArgs);
            break;
        case 'run-logs':
            await runRunLogsCommand(runtime, commandArgs);
            break;
        case 'serve':
            await runServeCommand(runtime, commandArgs);
            break;
        case 'doctor':
            await runDoctorCommand(runtime, commandArgs);
            break;
        default:
            printHelp();
            break;
    }
}

main()
    .catch((error: unknown) => {
        console.error('[FATAL]', describeFatal(error));
        process.exitCode = 1;
    })
    .finally(async () => {
        await closeDatabase();
    });
