import { DEFAULT_FLOW_SETTINGS } from '../src/config';
import { parseAmount, parseName, parsePrice, parseType, parseYesNo } from '../src/flow/fields';

const settings = { ...DEFAULT_FLOW_SETTINGS, maxItemAmount: 10, maxItemPrice: 100 };

describe('field parsers', () => {
    it('trims names and validates them', () => {
        expect(parseName('  Lamp  ', settings)).toEqual({ ok: true, value: 'Lamp' });
        expect(parseName('Lämp', settings)).toEqual({
            ok: false,
            error: 'Item name must be 1-255 characters of latin letters, digits, spaces or punctuation.'
        });
    });

    it('bounds amounts', () => {
        expect(parseAmount('3', settings)).toEqual({ ok: true, value: 3 });
        expect(parseAmount('10', settings)).toEqual({ ok: true, value: 10 });
        expect(parseAmount('0', settings)).toEqual({ ok: false, error: 'Amount must be between 1 and 10.' });
        expect(parseAmount('11', settings)).toEqual({ ok: false, error: 'Amount must be between 1 and 10.' });
        expect(parseAmount('2.5', settings)).toEqual({ ok: false, error: 'Amount must be a whole number.' });
    });

    it('lowercases types and checks membership', () => {
        expect(parseType('Spare Part', settings)).toEqual({ ok: true, value: 'spare part' });
        expect(parseType('tools', settings)).toEqual({
            ok: false,
            error: 'Item type must be one of: spare part or miscellaneous.'
        });
    });

    it('rounds prices to cents and bounds them', () => {
        expect(parsePrice('9.99', settings)).toEqual({ ok: true, value: 9.99 });
        expect(parsePrice('1e1', settings)).toEqual({ ok: true, value: 10 });
        expect(parsePrice('9.999', settings)).toEqual({ ok: true, value: 10 });
        expect(parsePrice('0', settings)).toEqual({ ok: true, value: 0 });
        expect(parsePrice('-1', settings)).toEqual({ ok: false, error: 'Price must be between 0 and 100.' });
        expect(parsePrice('100.01', settings)).toEqual({ ok: false, error: 'Price must be between 0 and 100.' });
        expect(parsePrice('free', settings)).toEqual({ ok: false, error: 'Price must be a number.' });
    });

    it('reads yes and no in any case', () => {
        expect(parseYesNo('YES')).toEqual({ ok: true, value: true });
        expect(parseYesNo(' no ')).toEqual({ ok: true, value: false });
        expect(parseYesNo('y')).toEqual({ ok: false, error: 'Incorrect value, must be yes/no.' });
    });
});
