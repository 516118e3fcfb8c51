export type PutCall = 'CALL' | 'PUT';

export interface OptionDeliverable {
    readonly symbol: string;
    readonly assetType: string;
    readonly deliverableUnits: string;
    readonly currencyType: string;
}

export interface OptionContract {
    readonly putCall: PutCall;
    readonly symbol: string;
    readonly description: string;
    readonly exchangeName: string;

    readonly bidPrice: number;
    readonly askPrice: number;
    readonly markPrice: number;
    readonly bidSize: number;
    readonly askSize: number;
    readonly lastSize: number;
    readonly highPrice: number;
    readonly lowPrice: number;
    readonly openPrice: number;
    readonly closePrice: number;
    readonly totalVolume: number;
    readonly netChange: number;
    readonly percentChange: number;
    readonly markChange: number;
    readonly markPercentChange: number;

    // Epoch milliseconds
    readonly quoteTimeInLong: number;
    readonly tradeTimeInLong: number;

    // Greeks and theoreticals: NaN when the pricing model produced no value
    readonly volatility: number;
    readonly delta: number;
    readonly gamma: number;
    readonly theta: number;
    readonly vega: number;
    readonly rho: number;
    readonly theoreticalOptionValue: number;
    readonly theoreticalVolatility: number;

    readonly timeValue: number;
    readonly openInterest: number;
    readonly isInTheMoney: boolean;
    readonly isMini: boolean;
    readonly isNonStandard: boolean;
    readonly isIndexOption: boolean;
    readonly strikePrice: number;
    /** Epoch milliseconds. */
    readonly expirationDate: number;
    readonly expirationType: string;
    readonly multiplier: number;
    readonly settlementType: string;
    readonly deliverableNote: string;
    readonly deliverables: readonly OptionDeliverable[];
}

export interface ExpirationGroup {
    /** Calendar date, YYYY-MM-DD. */
    readonly expirationDate: string;
    readonly daysToExpiration: number;
    /** One contract per strike, ascending by strike price. */
    readonly strikes: readonly OptionContract[];
}

export interface UnderlyingQuote {
    readonly symbol: string;
    readonly description: string;
    readonly exchangeName: string;
    readonly ask: number;
    readonly askSize: number;
    readonly bid: number;
    readonly bidSize: number;
    readonly last: number;
    readonly mark: number;
    readonly change: number;
    readonly percentChange: number;
    readonly markChange: number;
    readonly markPercentChange: number;
    readonly highPrice: number;
    readonly lowPrice: number;
    readonly openPrice: number;
    readonly close: number;
    readonly fiftyTwoWeekHigh: number;
    readonly fiftyTwoWeekLow: number;
    readonly totalVolume: number;
    readonly quoteTime: number;
    readonly tradeTime: number;
    readonly delayed: boolean;
}

export interface OptionChain {
    readonly symbol: string;
    /** "SUCCESS" when the query produced a usable chain. */
    readonly status: string;
    /** Null unless quotes were included in the response. */
    readonly underlying: UnderlyingQuote | null;
    readonly strategy: string;
    readonly interval: number;
    readonly isDelayed: boolean;
    readonly isIndex: boolean;
    readonly daysToExpiration: number;
    readonly interestRate: number;
    readonly underlyingPrice: number;
    readonly volatility: number;
    /** Ascending by days to expiration. */
    readonly calls: readonly ExpirationGroup[];
    /** Ascending by days to expiration. */
    readonly puts: readonly ExpirationGroup[];
}

/**
 * Parameters of an option chain request. The enumerated fields are plain strings
 * because they are checked at run time; see `validateOptionChainQuery`.
 */
export interface OptionChainQuery {
    /** CALL, PUT or ALL (default). */
    contractType?: string;
    strikeCount?: number;
    /** Absent leaves the choice to the server. */
    includeQuotes?: boolean;
    /** One of STRATEGIES, SINGLE by default. */
    strategy?: string;
    interval?: number;
    strike?: number;
    /** ITM, NTM, OTM, SAK, SBK, SNK or ALL. Not enforced. */
    range?: string;
    /** YYYY-MM-DD, or a Date taken at its UTC calendar day. */
    fromDate?: string | Date;
    toDate?: string | Date;
    volatility?: number;
    underlyingPrice?: number;
    interestRate?: number;
    daysToExpiration?: number;
    /** JAN..DEC or ALL (default). */
    expMonth?: string;
    /** S, NS or ALL (default). */
    optionType?: string;
}

export type HttpMethod = 'GET' | 'POST';

export interface RequestOptions {
    signal?: AbortSignal;
}

export interface TransportResponse {
    data: unknown;
    status: number;
}

/** Sends one request and resolves with the decoded body; rejects with a TransportError. */
export interface Transport {
    send(method: HttpMethod, path: string, body?: object, options?: RequestOptions): Promise<TransportResponse>;
}
