import { Logger } from '../logger';

export function formatDuration(ms: number): string {
    return `${(ms / 1000).toFixed(3)}s`;
}

export async function withTimer<T>(
    logger: Pick<Logger, 'debug'>,
    operation: string,
    fn: () => Promise<T>
): Promise<T> {
    const start = performance.now();
    logger.debug(`Starting ${operation}`);
    try {
        return await fn();
    } finally {
        logger.debug(`Completed ${operation} in ${formatDuration(performance.now() - start)}`);
    }
}

export function sleep(ms: number): Promise<void> {
    return new Promise(res => setTimeout(res, ms));
}
