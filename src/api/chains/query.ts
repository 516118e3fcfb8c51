import { ValidationError } from './errors';
import { OptionChainQuery } from './types';
import { logger } from '../../utils/logger';

export const CHAINS_PATH = 'marketdata/chains';

export const CONTRACT_TYPES = Object.freeze(['CALL', 'PUT', 'ALL'] as const);
export const STRATEGIES = Object.freeze([
    'SINGLE', 'ANALYTICAL', 'COVERED', 'VERTICAL', 'CALENDAR', 'STRANGLE',
    'STRADDLE', 'BUTTERFLY', 'CONDOR', 'DIAGONAL', 'COLLAR', 'ROLL',
] as const);
export const RANGES = Object.freeze(['ITM', 'NTM', 'OTM', 'SAK', 'SBK', 'SNK', 'ALL'] as const);
export const EXP_MONTHS = Object.freeze([
    'JAN', 'FEB', 'MAR', 'APR', 'MAY', 'JUN', 'JUL', 'AUG', 'SEP', 'OCT', 'NOV', 'DEC', 'ALL',
] as const);
export const OPTION_TYPES = Object.freeze(['S', 'NS', 'ALL'] as const);

export type ContractType = (typeof CONTRACT_TYPES)[number];
export type Strategy = (typeof STRATEGIES)[number];
export type Range = (typeof RANGES)[number];
export type ExpMonth = (typeof EXP_MONTHS)[number];
export type OptionType = (typeof OPTION_TYPES)[number];

type EnumeratedField = 'contractType' | 'strategy' | 'expMonth' | 'optionType';

const ENUMERATED_FIELDS: ReadonlyArray<{ field: EnumeratedField; allowed: readonly string[]; fallback: string }> = [
    { field: 'contractType', allowed: CONTRACT_TYPES, fallback: 'ALL' },
    { field: 'strategy', allowed: STRATEGIES, fallback: 'SINGLE' },
    { field: 'expMonth', allowed: EXP_MONTHS, fallback: 'ALL' },
    { field: 'optionType', allowed: OPTION_TYPES, fallback: 'ALL' },
];

/**
 * Fills in defaults for `contractType`, `strategy`, `expMonth` and `optionType`
 * and rejects values outside their enumerations. Mutates `query`.
 *
 * `range` is deliberately left lax: the server accepts it unchecked and so does
 * this function. A value outside RANGES only produces a warning.
 */
export const validateOptionChainQuery = (query: OptionChainQuery): void => {
    for (const { field, allowed, fallback } of ENUMERATED_FIELDS) {
        const value = query[field];
        if (!value) {
            query[field] = fallback;
        } else if (!allowed.includes(value)) {
            throw new ValidationError(field, allowed);
        }
    }

    if (query.range && !RANGES.some((range) => range === query.range)) {
        logger.warn(`[QUERY] range "${query.range}" is not one of [${RANGES.join(' ')}], sending it anyway`);
    }
};

const formatDate = (field: 'fromDate' | 'toDate', value: string | Date): string => {
    if (typeof value === 'string') return value;
    if (Number.isNaN(value.getTime())) {
        throw new ValidationError(field, [], `${field} is not a valid date`);
    }
    return value.toISOString().slice(0, 10);
};

/**
 * Builds `marketdata/chains?...` for a validated query. Empty strings, zero and
 * undefined numbers are left out; `includeQuotes` is sent whenever it is set.
 * Parameters are sorted by name.
 */
export const buildOptionChainPath = (symbol: string, query: OptionChainQuery): string => {
    if (!symbol.trim()) {
        throw new ValidationError('symbol', [], 'symbol is required');
    }

    const params = new URLSearchParams({ symbol: symbol.trim().toUpperCase() });
    const strings = {
        contractType: query.contractType,
        strategy: query.strategy,
        range: query.range,
        expMonth: query.expMonth,
        optionType: query.optionType,
    };
    const numbers = {
        strikeCount: query.strikeCount,
        interval: query.interval,
        strike: query.strike,
        volatility: query.volatility,
        underlyingPrice: query.underlyingPrice,
        interestRate: query.interestRate,
        daysToExpiration: query.daysToExpiration,
    };

    for (const [name, value] of Object.entries(strings)) {
        if (value) params.append(name, value);
    }
    for (const [name, value] of Object.entries(numbers)) {
        if (value) params.append(name, String(value));
    }
    if (query.includeQuotes !== undefined) {
        params.append('includeQuotes', String(query.includeQuotes));
    }
    if (query.fromDate) params.append('fromDate', formatDate('fromDate', query.fromDate));
    if (query.toDate) params.append('toDate', formatDate('toDate', query.toDate));

    params.sort();
    return `${CHAINS_PATH}?${params.toString()}`;
};
