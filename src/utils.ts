export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Delay before the retry that follows `attempt` (1-based):
 * base * 2^(attempt - 1), capped at maxDelay.
 */
export const calculateBackoff = (attempt: number, baseDelay: number, maxDelay = 60000): number => {
    return Math.min(baseDelay * Math.pow(2, attempt - 1), maxDelay);
};

/** Collapses runs of whitespace and trims. */
export const cleanText = (text: string | undefined): string => {
    return (text ?? '').split(/\s+/).filter(Boolean).join(' ');
};

export const isHttpUrl = (value: string): boolean => {
    if (!URL.canParse(value)) {
        return false;
    }
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
};

export const formatDuration = (ms: number): string => `${(ms / 1000).toFixed(1)}s`;
