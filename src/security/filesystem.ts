import fs from 'fs';
import path from 'path';

/** Permessi del DB locale: solo l'utente che esegue il supervisor (sessioni e numeri sono dati personali). */
const PRIVATE_DIRECTORY_MODE = 0o700;
const PRIVATE_FILE_MODE = 0o600;

function restrictMode(targetPath: string, mode: number): void {
    if (process.platform === 'win32') {
        return;
    }
    try {
        fs.chmodSync(targetPath, mode);
    } catch (error) {
        // FS senza permessi POSIX (volumi montati, alcuni container): si prosegue con un avviso.
        console.warn(
            `[WARN] filesystem.chmod_failed ${targetPath}`,
            error instanceof Error ? error.message : String(error)
        );
    }
}

export function ensureDatabaseDirectory(databasePath: string): void {
    const directoryPath = path.dirname(databasePath);
    if (!fs.existsSync(directoryPath)) {
        fs.mkdirSync(directoryPath, { recursive: true });
    }
    restrictMode(directoryPath, PRIVATE_DIRECTORY_MODE);
}

export function restrictDatabaseFile(databasePath: string): void {
    if (!fs.existsSync(databasePath)) {
        return;
    }
    restrictMode(databasePath, PRIVATE_FILE_MODE);
}

/** Un modulo caricato con `require` non deve essere modificabile da altri utenti. */
export function isWritableByOthers(targetPath: string): boolean {
    if (process.platform === 'win32') {
        return false;
    }
    return (fs.statSync(targetPath).mode & 0o022) !== 0;
}
