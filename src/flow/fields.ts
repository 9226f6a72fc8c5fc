import { FlowSettings } from '../config';
import { isFloat, isInt, validateText } from '../core/validators';
import {
    amountOutOfRange,
    invalidName,
    NOT_A_NUMBER,
    NOT_A_WHOLE_NUMBER,
    NOT_YES_NO,
    priceOutOfRange,
    typeNotAllowed
} from './messages';

export type FieldResult<T> = { ok: true; value: T } | { ok: false; error: string };

const ok = <T>(value: T): FieldResult<T> => ({ ok: true, value });
const fail = <T>(error: string): FieldResult<T> => ({ ok: false, error });

export const parseName = (input: string, settings: FlowSettings): FieldResult<string> => {
    const name = input.trim();
    return validateText(name, settings.minNameLength, settings.maxNameLength)
        ? ok(name)
        : fail(invalidName(settings));
};

export const parseAmount = (input: string, settings: FlowSettings): FieldResult<number> => {
    if (!isInt(input)) return fail(NOT_A_WHOLE_NUMBER);
    const amount = Number(input.trim());
    if (amount < 1 || amount > settings.maxItemAmount) return fail(amountOutOfRange(settings));
    return ok(amount);
};

/** Accepted types are stored lowercase. */
export const parseType = (input: string, settings: FlowSettings): FieldResult<string> => {
    const type = input.trim().toLowerCase();
    return settings.allowedTypes.includes(type) ? ok(type) : fail(typeNotAllowed(settings));
};

export const roundPrice = (price: number): number => Math.round(price * 100) / 100;

export const parsePrice = (input: string, settings: FlowSettings): FieldResult<number> => {
    if (!isFloat(input)) return fail(NOT_A_NUMBER);
    const price = roundPrice(Number(input.trim()));
    if (price < 0 || price > settings.maxItemPrice) return fail(priceOutOfRange(settings));
    // -0.001 rounds to -0
    return ok(price === 0 ? 0 : price);
};

export const parseYesNo = (input: string): FieldResult<boolean> => {
    const answer = input.trim().toLowerCase();
    if (answer === 'yes') return ok(true);
    if (answer === 'no') return ok(false);
    return fail(NOT_YES_NO);
};
