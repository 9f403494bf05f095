import * as uuid from 'uuid';

let debugEnabled = process.env.DEBUG === 'true';
const issuedWarnings = new Set<string>();

export function setDebug(enabled: boolean) {
    debugEnabled = enabled;
}

export function dbg(s: string) {
    if (debugEnabled) {
        console.debug(s);
    }
}

export function say(s: string) {
    console.log(s);
}

/**
 * Writes a warning the first time a given key is seen in this process.
 * Used for degradations that would otherwise repeat on every request,
 * such as a missing model backend.
 *
 * @returns true when the warning was written, false when it had already been issued
 */
export function warnOnce(key: string, message: string): boolean {
    if (issuedWarnings.has(key)) {
        return false;
    }
    issuedWarnings.add(key);
    console.warn(message);
    return true;
}

export function newSessionId(): string {
    return uuid.v4();
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}
