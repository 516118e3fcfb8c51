import { decodeOptionChain } from '../api/chains/decode';
import { QueryStatusError } from '../api/chains/errors';
import { buildOptionChainPath, validateOptionChainQuery } from '../api/chains/query';
import { OptionChain, OptionChainQuery, RequestOptions, Transport } from '../api/chains/types';
import { logger } from '../utils/logger';

export const SUCCESS_STATUS = 'SUCCESS';

export class OptionChainService {
    constructor(private readonly transport: Transport) {}

    /**
     * Fetches and decodes the option chain for `symbol`.
     *
     * A null query is sent with every default applied. The query is validated
     * before anything goes out; a body whose status is not SUCCESS is decoded in
     * full and then rejected with a QueryStatusError that carries it.
     */
    async fetchOptionChain(
        symbol: string,
        query: OptionChainQuery | null,
        options: RequestOptions = {}
    ): Promise<OptionChain> {
        const effectiveQuery = query ?? {};
        validateOptionChainQuery(effectiveQuery);
        const path = buildOptionChainPath(symbol, effectiveQuery);

        logger.debug(`[CHAIN] GET ${path}`);
        const { data } = await this.transport.send('GET', path, undefined, options);

        let chain: OptionChain;
        try {
            chain = decodeOptionChain(data);
        } catch (error) {
            logger.error(`[CHAIN] Could not decode response for ${symbol}: ${error instanceof Error ? error.message : String(error)}`);
            throw error;
        }

        if (chain.status !== SUCCESS_STATUS) {
            logger.warn(`[CHAIN] ${chain.symbol} returned status ${chain.status}`);
            throw new QueryStatusError(chain.status, chain);
        }

        logger.debug(`[CHAIN] ${chain.symbol}: ${chain.calls.length} call and ${chain.puts.length} put expirations`);
        return chain;
    }
}
