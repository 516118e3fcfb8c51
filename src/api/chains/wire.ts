/**
 * Wire format of the `marketdata/chains` response.
 *
 * These schemas describe the body as the server sends it: expiration maps keyed by
 * "YYYY-MM-DD:days", strike maps keyed by the strike as a string, every contract
 * wrapped in a one-element array, greeks that may be the string "NaN". The raw types
 * stay behind `decode.ts`, which turns the parsed shape into the public model.
 */

import { z } from 'zod';
import { decodeNaNFloat } from './sentinel';
import { DecodeError, FormatError } from './errors';

const nanFloat = z.unknown().transform((token, ctx) => {
    try {
        return decodeNaNFloat(token);
    } catch (error) {
        if (!(error instanceof DecodeError)) throw error;
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: error.message,
            params: { sentinel: true },
        });
        return z.NEVER;
    }
});

// Text and flag fields the server sends as null, or leaves out, read as '' and false
const text = z.string().nullish().transform((value) => value ?? '');
const flag = z.boolean().nullish().transform((value) => value ?? false);

const rawDeliverableSchema = z.object({
    symbol: text,
    assetType: text,
    // Sent as a number by the server, kept as text like the other deliverable fields
    deliverableUnits: z.union([text, z.number()]).transform(String),
    currencyType: text,
});

const rawContractSchema = z.object({
    putCall: z.enum(['CALL', 'PUT']),
    symbol: text,
    description: text,
    exchangeName: text,
    bidPrice: z.number(),
    askPrice: z.number(),
    markPrice: z.number(),
    bidSize: z.number(),
    askSize: z.number(),
    lastSize: z.number(),
    highPrice: z.number(),
    lowPrice: z.number(),
    openPrice: z.number(),
    closePrice: z.number(),
    totalVolume: z.number(),
    quoteTimeInLong: z.number(),
    tradeTimeInLong: z.number(),
    netChange: z.number(),
    volatility: nanFloat,
    delta: nanFloat,
    gamma: nanFloat,
    theta: nanFloat,
    vega: nanFloat,
    rho: nanFloat,
    timeValue: z.number(),
    openInterest: z.number(),
    isInTheMoney: flag,
    theoreticalOptionValue: nanFloat,
    theoreticalVolatility: nanFloat,
    isMini: flag,
    isNonStandard: flag,
    optionDeliverablesList: z.array(rawDeliverableSchema).nullish(),
    strikePrice: z.number(),
    expirationDate: z.number(),
    expirationType: text,
    multiplier: z.number(),
    settlementType: text,
    deliverableNote: text,
    isIndexOption: flag,
    percentChange: z.number(),
    markChange: z.number(),
    markPercentChange: z.number(),
});

const rawUnderlyingSchema = z.object({
    ask: z.number(),
    askSize: z.number(),
    bid: z.number(),
    bidSize: z.number(),
    change: z.number(),
    close: z.number(),
    delayed: flag,
    description: text,
    exchangeName: text,
    fiftyTwoWeekHigh: z.number(),
    fiftyTwoWeekLow: z.number(),
    highPrice: z.number(),
    last: z.number(),
    lowPrice: z.number(),
    mark: z.number(),
    markChange: z.number(),
    markPercentChange: z.number(),
    openPrice: z.number(),
    percentChange: z.number(),
    quoteTime: z.number(),
    symbol: text,
    totalVolume: z.number(),
    tradeTime: z.number(),
});

// expiration key -> strike key -> [contract]
const rawExpDateMapSchema = z.record(z.string(), z.record(z.string(), z.array(rawContractSchema)));

export const rawOptionChainSchema = z.object({
    symbol: z.string(),
    status: z.string(),
    underlying: rawUnderlyingSchema.nullish(),
    strategy: text,
    interval: z.number(),
    isDelayed: flag,
    isIndex: flag,
    daysToExpiration: z.number(),
    interestRate: z.number(),
    underlyingPrice: z.number(),
    volatility: nanFloat,
    callExpDateMap: rawExpDateMapSchema.nullish(),
    putExpDateMap: rawExpDateMapSchema.nullish(),
});

export type RawContract = z.output<typeof rawContractSchema>;
export type RawUnderlying = z.output<typeof rawUnderlyingSchema>;
export type RawExpDateMap = z.output<typeof rawExpDateMapSchema>;

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

/** Renders a zod issue path as a JS accessor, e.g. `callExpDateMap["2024-06-21:30"]["50.0"][0].delta`. */
export const formatPath = (path: readonly (string | number)[]): string =>
    path
        .map((segment, index) => {
            if (typeof segment === 'number') return `[${segment}]`;
            if (IDENTIFIER.test(segment)) return index === 0 ? segment : `.${segment}`;
            return `[${JSON.stringify(segment)}]`;
        })
        .join('') || '<root>';

/** Converts the first zod issue into the error kind the decoder reports. */
export const toWireError = (error: z.ZodError): FormatError | DecodeError => {
    const [issue] = error.issues;
    if (!issue) {
        return new FormatError('<root>', error.message);
    }
    const path = formatPath(issue.path);
    const isSentinel = issue.code === z.ZodIssueCode.custom && issue.params?.sentinel === true;
    const isNumber = issue.code === z.ZodIssueCode.invalid_type && issue.expected === 'number';
    if (isSentinel || isNumber) {
        return new DecodeError(path, issue.message);
    }
    return new FormatError(path, issue.message);
};
