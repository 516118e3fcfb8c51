type Json = Record<string, unknown>;

export const rawContract = (overrides: Json = {}): Json => ({
    putCall: 'CALL',
    symbol: 'XYZ_062124C50',
    description: 'XYZ Jun 21 2024 50 Call',
    exchangeName: 'OPR',
    bidPrice: 1.1,
    askPrice: 1.2,
    markPrice: 1.15,
    bidSize: 10,
    askSize: 12,
    lastSize: 1,
    highPrice: 1.3,
    lowPrice: 1.0,
    openPrice: 1.05,
    closePrice: 1.1,
    totalVolume: 250,
    quoteTimeInLong: 1718900000000,
    tradeTimeInLong: 1718899990000,
    netChange: 0.05,
    volatility: 25.5,
    delta: 0.5,
    gamma: 0.04,
    theta: -0.02,
    vega: 0.1,
    rho: 0.01,
    timeValue: 1.15,
    openInterest: 1200,
    isInTheMoney: false,
    theoreticalOptionValue: 1.16,
    theoreticalVolatility: 29,
    isMini: false,
    isNonStandard: false,
    optionDeliverablesList: null,
    strikePrice: 50,
    expirationDate: 1718985600000,
    expirationType: 'R',
    multiplier: 100,
    settlementType: ' ',
    deliverableNote: '',
    isIndexOption: false,
    percentChange: 4.55,
    markChange: 0.05,
    markPercentChange: 4.55,
    ...overrides,
});

export const rawUnderlying = (overrides: Json = {}): Json => ({
    ask: 50.12,
    askSize: 300,
    bid: 50.1,
    bidSize: 200,
    change: 0.4,
    close: 49.7,
    delayed: true,
    description: 'XYZ Corp',
    exchangeName: 'NASDAQ',
    fiftyTwoWeekHigh: 61.2,
    fiftyTwoWeekLow: 38.5,
    highPrice: 50.5,
    last: 50.1,
    lowPrice: 49.6,
    mark: 50.11,
    markChange: 0.41,
    markPercentChange: 0.82,
    openPrice: 49.8,
    percentChange: 0.8,
    quoteTime: 1718900000000,
    symbol: 'XYZ',
    totalVolume: 1500000,
    tradeTime: 1718899990000,
    ...overrides,
});

export const rawChain = (overrides: Json = {}): Json => ({
    symbol: 'XYZ',
    status: 'SUCCESS',
    underlying: null,
    strategy: 'SINGLE',
    interval: 0,
    isDelayed: true,
    isIndex: false,
    daysToExpiration: 0,
    interestRate: 0.1,
    underlyingPrice: 50.11,
    volatility: 29,
    callExpDateMap: {},
    putExpDateMap: {},
    ...overrides,
});
