export * from './api/chains/types';
export * from './api/chains/errors';
export { decodeNaNFloat, NAN_SENTINEL } from './api/chains/sentinel';
export { decodeOptionChain, parseExpirationKey } from './api/chains/decode';
export {
    buildOptionChainPath,
    validateOptionChainQuery,
    CONTRACT_TYPES,
    STRATEGIES,
    RANGES,
    EXP_MONTHS,
    OPTION_TYPES,
} from './api/chains/query';
export type { ContractType, Strategy, Range, ExpMonth, OptionType } from './api/chains/query';
export { default as MarketDataClient } from './api/chains/client';
export type { MarketDataClientOptions } from './api/chains/client';
export { fetchOptionChain, createMarketDataClient } from './api/chains/optionChain';
export { OptionChainService, SUCCESS_STATUS } from './services/optionChainService';
