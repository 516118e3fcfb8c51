import { buildOptionChainPath, STRATEGIES, validateOptionChainQuery } from '../src/api/chains/query';
import { ValidationError } from '../src/api/chains/errors';
import { OptionChainQuery } from '../src/api/chains/types';

describe('validateOptionChainQuery', () => {
    it('fills in every default on an empty query', () => {
        const query: OptionChainQuery = {};
        validateOptionChainQuery(query);

        expect(query).toEqual({ contractType: 'ALL', strategy: 'SINGLE', expMonth: 'ALL', optionType: 'ALL' });
    });

    it('defaults an empty strategy to SINGLE', () => {
        const query: OptionChainQuery = { strategy: '' };
        validateOptionChainQuery(query);

        expect(query.strategy).toBe('SINGLE');
    });

    it('keeps a valid strategy', () => {
        const query: OptionChainQuery = { strategy: 'VERTICAL' };
        validateOptionChainQuery(query);

        expect(query.strategy).toBe('VERTICAL');
    });

    it('rejects an unknown strategy and names the allowed values', () => {
        const query: OptionChainQuery = { strategy: 'BOGUS' };

        expect(() => validateOptionChainQuery(query)).toThrow(ValidationError);
        try {
            validateOptionChainQuery(query);
        } catch (error) {
            expect(error).toHaveProperty('field', 'strategy');
            expect(error).toHaveProperty('allowed', STRATEGIES);
            expect(error).toHaveProperty(
                'message',
                'invalid strategy, must have the value of one of the following [SINGLE ANALYTICAL COVERED VERTICAL CALENDAR STRANGLE STRADDLE BUTTERFLY CONDOR DIAGONAL COLLAR ROLL]'
            );
        }
    });

    it.each([
        ['contractType', 'BOTH'],
        ['contractType', 'call'],
        ['expMonth', 'JANUARY'],
        ['optionType', 'X'],
    ] as const)('rejects %s=%s', (field, value) => {
        const query: OptionChainQuery = {};
        query[field] = value;

        expect(() => validateOptionChainQuery(query)).toThrow(ValidationError);
    });

    it('passes an unknown range through', () => {
        const query: OptionChainQuery = { range: 'WIDE' };
        validateOptionChainQuery(query);

        expect(query.range).toBe('WIDE');
    });
});

describe('buildOptionChainPath', () => {
    it('encodes the defaults and the symbol', () => {
        const query: OptionChainQuery = {};
        validateOptionChainQuery(query);

        expect(buildOptionChainPath('xyz', query)).toBe(
            'marketdata/chains?contractType=ALL&expMonth=ALL&optionType=ALL&strategy=SINGLE&symbol=XYZ'
        );
    });

    it('sorts parameters and leaves out zero numbers', () => {
        const query: OptionChainQuery = {
            contractType: 'PUT',
            strikeCount: 5,
            includeQuotes: false,
            strategy: 'SINGLE',
            range: 'OTM',
            fromDate: '2024-01-01',
            toDate: new Date(Date.UTC(2024, 5, 30)),
            strike: 0,
            interval: 0,
            expMonth: 'ALL',
            optionType: 'ALL',
        };

        expect(buildOptionChainPath('XYZ', query)).toBe(
            'marketdata/chains?contractType=PUT&expMonth=ALL&fromDate=2024-01-01&includeQuotes=false' +
                '&optionType=ALL&range=OTM&strategy=SINGLE&strikeCount=5&symbol=XYZ&toDate=2024-06-30'
        );
    });

    it('sends the analytical inputs', () => {
        expect(
            buildOptionChainPath('XYZ', { strategy: 'ANALYTICAL', volatility: 30, underlyingPrice: 52.5, interestRate: 4.1, daysToExpiration: 14 })
        ).toBe(
            'marketdata/chains?daysToExpiration=14&interestRate=4.1&strategy=ANALYTICAL&symbol=XYZ&underlyingPrice=52.5&volatility=30'
        );
    });

    it('escapes index symbols', () => {
        expect(buildOptionChainPath('$SPX.X', {})).toBe('marketdata/chains?symbol=%24SPX.X');
    });

    it('rejects an invalid Date as a ValidationError', () => {
        const failure = (() => {
            try {
                buildOptionChainPath('XYZ', { toDate: new Date('not a date') });
            } catch (error) {
                return error;
            }
            return undefined;
        })();

        expect(failure).toBeInstanceOf(ValidationError);
        expect(failure).toHaveProperty('field', 'toDate');
        expect(failure).toHaveProperty('message', 'toDate is not a valid date');
    });

    it('rejects a blank symbol', () => {
        expect(() => buildOptionChainPath('  ', {})).toThrow(ValidationError);
    });
});
