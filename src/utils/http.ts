import axios, { CanceledError } from 'axios';
import { TransportError } from '../api/chains/errors';

/** Resolves after `ms`, or rejects with axios' CanceledError as soon as `signal` aborts. */
export const sleep = (ms: number, signal?: AbortSignal) =>
    new Promise<void>((resolve, reject) => {
        if (signal?.aborted) {
            reject(new CanceledError());
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            reject(new CanceledError());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });

export const isRateLimited = (error: unknown): boolean =>
    axios.isAxiosError(error) && error.response?.status === 429;

/**
 * Wraps whatever axios threw into a TransportError, keeping the HTTP status and
 * body when the server answered.
 */
export const toTransportError = (error: unknown, method: string, url: string): TransportError => {
    if (error instanceof TransportError) {
        return error;
    }
    if (axios.isAxiosError(error)) {
        if (error.response) {
            const { status, data } = error.response;
            return new TransportError(
                `${method} ${url} failed with ${status}: ${JSON.stringify(data)}`,
                status,
                data,
                { cause: error }
            );
        }
        return new TransportError(`${method} ${url} failed: ${error.message}`, undefined, undefined, { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new TransportError(`${method} ${url} failed: ${message}`, undefined, undefined, { cause: error });
};
