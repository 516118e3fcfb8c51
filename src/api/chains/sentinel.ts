import { DecodeError } from './errors';

/** String the server sends in place of a greek or theoretical value it could not compute. */
export const NAN_SENTINEL = 'NaN';

/**
 * Decodes a JSON scalar that is normally a number but may be the "NaN" sentinel.
 * Numeric-looking strings are rejected: the server never quotes real numbers.
 */
export const decodeNaNFloat = (token: unknown, path = ''): number => {
    if (token === NAN_SENTINEL) {
        return Number.NaN;
    }
    if (typeof token === 'number') {
        return token;
    }
    const shown = token === undefined ? 'undefined' : JSON.stringify(token);
    throw new DecodeError(path, `expected a number or "${NAN_SENTINEL}", got ${shown}`);
};
