import { rawOptionChainSchema, toWireError, RawContract, RawExpDateMap, RawUnderlying } from './wire';
import { FormatError } from './errors';
import { ExpirationGroup, OptionChain, OptionContract, UnderlyingQuote } from './types';

const EXPIRATION_KEY_SEPARATOR = ':';
const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_COUNT = /^\d+$/;

type Side = 'callExpDateMap' | 'putExpDateMap';

interface ExpirationKey {
    expirationDate: string;
    daysToExpiration: number;
}

const isCalendarDate = (value: string): boolean => {
    const match = CALENDAR_DATE.exec(value);
    if (!match) return false;
    const [, year, month, day] = match.map(Number);
    const date = new Date(Date.UTC(year, month - 1, day));
    // Date.UTC rolls 2024-02-30 over into March; a real date survives the round trip
    return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
};

/**
 * Splits an expiration map key such as "2024-06-21:30" into its calendar date
 * and day count.
 */
export const parseExpirationKey = (key: string, path = key): ExpirationKey => {
    const parts = key.split(EXPIRATION_KEY_SEPARATOR);
    if (parts.length !== 2) {
        throw new FormatError(path, `expiration key "${key}" is not of the form YYYY-MM-DD:days`);
    }
    const [datePart, daysPart] = parts;
    if (!isCalendarDate(datePart)) {
        throw new FormatError(path, `expiration key "${key}" has an invalid date "${datePart}"`);
    }
    if (!DAY_COUNT.test(daysPart)) {
        throw new FormatError(path, `expiration key "${key}" has an invalid day count "${daysPart}"`);
    }
    return { expirationDate: datePart, daysToExpiration: Number(daysPart) };
};

const toContract = (raw: RawContract): OptionContract => {
    const { optionDeliverablesList, ...fields } = raw;
    return Object.freeze({
        ...fields,
        deliverables: Object.freeze((optionDeliverablesList ?? []).map((item) => Object.freeze({ ...item }))),
    });
};

const toUnderlying = (raw: RawUnderlying): UnderlyingQuote => Object.freeze({ ...raw });

const toExpirationGroups = (side: Side, map: RawExpDateMap | null | undefined): readonly ExpirationGroup[] => {
    const groups = Object.entries(map ?? {}).map(([key, strikeMap]): ExpirationGroup => {
        const keyPath = `${side}[${JSON.stringify(key)}]`;
        const { expirationDate, daysToExpiration } = parseExpirationKey(key, keyPath);

        const strikes = Object.entries(strikeMap).map(([strike, wrapped]) => {
            if (wrapped.length !== 1) {
                throw new FormatError(
                    `${keyPath}[${JSON.stringify(strike)}]`,
                    `expected exactly one contract per strike, found ${wrapped.length}`
                );
            }
            return toContract(wrapped[0]);
        });
        strikes.sort((a, b) => a.strikePrice - b.strikePrice);

        return Object.freeze({ expirationDate, daysToExpiration, strikes: Object.freeze(strikes) });
    });

    // Same day count on two dates: earlier date first. ISO dates compare correctly as strings.
    groups.sort((a, b) =>
        a.daysToExpiration - b.daysToExpiration ||
        (a.expirationDate < b.expirationDate ? -1 : a.expirationDate > b.expirationDate ? 1 : 0)
    );
    return Object.freeze(groups);
};

/**
 * Decodes a `marketdata/chains` response body into an immutable OptionChain.
 *
 * Throws FormatError for shape problems (bad expiration keys, strike entries that
 * do not hold exactly one contract, wrong field types) and DecodeError for numeric
 * fields that are neither numbers nor the "NaN" sentinel. Nothing partial is returned.
 * The status is not checked here.
 */
export const decodeOptionChain = (body: unknown): OptionChain => {
    const parsed = rawOptionChainSchema.safeParse(body);
    if (!parsed.success) {
        throw toWireError(parsed.error);
    }
    const { callExpDateMap, putExpDateMap, underlying, ...fields } = parsed.data;

    return Object.freeze({
        ...fields,
        underlying: underlying ? toUnderlying(underlying) : null,
        calls: toExpirationGroups('callExpDateMap', callExpDateMap),
        puts: toExpirationGroups('putExpDateMap', putExpDateMap),
    });
};
