const RETRY_DELAY_BASE = 100;
const MAX_RETRY_DELAY = 5000;
const MAX_RETRIES = 5;
const THROTTLING_ERROR_NAMES = ['ThrottlingException', 'Throttling'];

export const withThrottlingRetry = async <T>(fn: () => Promise<T>): Promise<T> => {
    return withExponentialBackoff(MAX_RETRIES, THROTTLING_ERROR_NAMES, fn);
};

/**
 * Full-jitter delay for the given attempt: a random wait up to `base * 2^(attempt + 1)`,
 * never longer than `MAX_RETRY_DELAY`.
 */
export const backoffDelay = (attempt: number, retryDelayBase: number = RETRY_DELAY_BASE): number => {
    const ceiling = Math.min(MAX_RETRY_DELAY, retryDelayBase * Math.pow(2, attempt + 1));
    return Math.random() * ceiling;
};

const isRetryable = (error: unknown, errorNames: string[]): error is Error =>
    error instanceof Error && errorNames.includes(error.name);

export const withExponentialBackoff = async <T>(
    maxRetries: number,
    errorNames: string[],
    fn: () => Promise<T>,
    retryDelayBase: number = RETRY_DELAY_BASE,
): Promise<T> => {
    for (let attempt = 0; ; attempt++) {
        try {
            return await fn();
        } catch (error) {
            if (attempt >= maxRetries || !isRetryable(error, errorNames)) {
                throw error;
            }
            console.warn(`${error.name} encountered. Retrying...`);
            await sleep(backoffDelay(attempt, retryDelayBase));
        }
    }
};

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));
