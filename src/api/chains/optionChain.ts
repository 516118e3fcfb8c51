import MarketDataClient from './client';
import { OptionChain, OptionChainQuery, RequestOptions } from './types';
import { OptionChainService } from '../../services/optionChainService';
import config from '../../config';

export const createMarketDataClient = () =>
    new MarketDataClient({
        baseUrl: config.baseUrl,
        accessToken: config.accessToken,
        apiKey: config.apiKey,
        timeoutMs: config.requestTimeoutMs,
        retries: config.maxRetries,
        backoffMs: config.retryBackoffMs,
    });

export const fetchOptionChain = async (
    symbol: string,
    query: OptionChainQuery | null = null,
    options: RequestOptions = {}
): Promise<OptionChain> => {
    const service = new OptionChainService(createMarketDataClient());
    return service.fetchOptionChain(symbol, query, options);
};
