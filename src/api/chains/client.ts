import axios from 'axios';
import { HttpMethod, RequestOptions, Transport, TransportResponse } from './types';
import { isRateLimited, sleep, toTransportError } from '../../utils/http';
import { logger } from '../../utils/logger';

export interface MarketDataClientOptions {
    baseUrl: string;
    /** Sent as a bearer token. */
    accessToken?: string;
    /** Sent as the `apikey` query parameter. */
    apiKey?: string;
    timeoutMs?: number;
    /** How many times a 429 is retried. */
    retries?: number;
    /** First wait after a 429; doubled on every retry. */
    backoffMs?: number;
}

class MarketDataClient implements Transport {
    private readonly baseUrl: string;
    private readonly accessToken: string;
    private readonly apiKey: string;
    private readonly timeoutMs: number;
    private readonly retries: number;
    private readonly backoffMs: number;

    constructor(options: MarketDataClientOptions) {
        this.baseUrl = options.baseUrl;
        this.accessToken = options.accessToken ?? '';
        this.apiKey = options.apiKey ?? '';
        this.timeoutMs = options.timeoutMs ?? 10000;
        this.retries = options.retries ?? 5;
        this.backoffMs = options.backoffMs ?? 2000;
    }

    /**
     * Core HTTP request handler. Retries rate-limited requests with exponential
     * backoff; every other failure becomes a TransportError.
     */
    public async send(
        method: HttpMethod,
        path: string,
        body?: object,
        options: RequestOptions = {}
    ): Promise<TransportResponse> {
        const headers: Record<string, string> = {
            'Accept': 'application/json',
        };
        if (body) headers['Content-Type'] = 'application/json';
        if (this.accessToken) headers['Authorization'] = `Bearer ${this.accessToken}`;

        let retriesLeft = this.retries;
        let backoff = this.backoffMs;

        for (;;) {
            try {
                const response = await axios.request({
                    baseURL: this.baseUrl,
                    url: path,
                    method,
                    headers,
                    data: body,
                    params: this.apiKey ? { apikey: this.apiKey } : undefined,
                    timeout: this.timeoutMs,
                    signal: options.signal,
                });
                return { data: response.data, status: response.status };
            } catch (error) {
                let failure: unknown = error;
                if (isRateLimited(error) && retriesLeft > 0) {
                    logger.warn(`[API] Rate limit hit (429). Retrying in ${backoff}ms... (${retriesLeft} retries left)`);
                    try {
                        await sleep(backoff, options.signal);
                        retriesLeft -= 1;
                        backoff *= 2;
                        continue;
                    } catch (aborted) {
                        failure = aborted;
                    }
                }
                const transportError = toTransportError(failure, method, path);
                logger.error(`[API] ${transportError.message}`);
                throw transportError;
            }
        }
    }
}

export default MarketDataClient;
