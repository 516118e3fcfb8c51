import type { OptionChain } from './types';

/** Base class for every failure raised while querying or decoding an option chain. */
export class OptionChainError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** A query field holds a value outside its enumeration. Raised before any request is sent. */
export class ValidationError extends OptionChainError {
    constructor(
        public readonly field: string,
        public readonly allowed: readonly string[],
        message = `invalid ${field}, must have the value of one of the following [${allowed.join(' ')}]`
    ) {
        super(message);
    }
}

/** The HTTP exchange itself failed (network, timeout, non-2xx). */
export class TransportError extends OptionChainError {
    constructor(
        message: string,
        public readonly status?: number,
        public readonly responseBody?: unknown,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

/**
 * The response body does not have the expected shape: a malformed expiration key,
 * a strike entry that does not hold exactly one contract, a bad date or day count.
 */
export class FormatError extends OptionChainError {
    constructor(
        public readonly path: string,
        message: string
    ) {
        super(`${path}: ${message}`);
    }
}

/** A numeric field holds neither a number nor the "NaN" sentinel. */
export class DecodeError extends OptionChainError {
    constructor(
        public readonly path: string,
        message: string
    ) {
        super(path ? `${path}: ${message}` : message);
    }
}

/**
 * The body decoded cleanly but the server reported a status other than SUCCESS.
 * The decoded chain is kept for diagnostics.
 */
export class QueryStatusError extends OptionChainError {
    constructor(
        public readonly status: string,
        public readonly chain: OptionChain
    ) {
        super(`option chain query for ${chain.symbol} returned status ${status}`);
    }
}
