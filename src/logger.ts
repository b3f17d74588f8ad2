let isVerbose = false;

export function setVerboseMode(verbose: boolean): void {
    isVerbose = verbose;
}

export function isVerboseMode(): boolean {
    return isVerbose;
}

function logWith(method: 'log' | 'warn' | 'error', args: unknown[]): void {
    console[method](...args);
}

export const logger = {
    debug(...args: unknown[]): void {
        if (!isVerbose) {
            return;
        }
        logWith('log', args);
    },
    info(...args: unknown[]): void {
        logWith('log', args);
    },
    warn(...args: unknown[]): void {
        logWith('warn', args);
    },
    error(...args: unknown[]): void {
        logWith('error', args);
    },
};
