import { describeError, Logger } from '../utils/logger';

const TEXT_PATTERN = /^[A-Za-z0-9 !"#$%&'()*+,\-./:;<=>?@[\\\]^_`{|}~]+$/;
const INT_PATTERN = /^\s*[+-]?\d+\s*$/;
const FLOAT_PATTERN = /^\s*[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?\s*$/;

export const validateText = (text: string, minLen: number, maxLen: number): boolean => {
    const lengthValid = text.length >= minLen && text.length <= maxLen;
    return lengthValid && TEXT_PATTERN.test(text);
};

export const isInt = (value: string): boolean => INT_PATTERN.test(value);

export const isFloat = (value: string): boolean => FLOAT_PATTERN.test(value);

const WEEKDAYS = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'];

interface LocalTime {
    weekday: number; // 0 = Monday
    hour: number;
    minute: number;
}

const toLocalTime = (now: Date, timeZone: string): LocalTime => {
    const parts = new Intl.DateTimeFormat('en-US', {
        timeZone,
        weekday: 'short',
        hour: '2-digit',
        minute: '2-digit',
        hourCycle: 'h23'
    }).formatToParts(now);

    const part = (type: Intl.DateTimeFormatPartTypes): string => {
        const found = parts.find(p => p.type === type);
        if (!found) throw new Error(`Missing ${type} in formatted time`);
        return found.value;
    };

    const weekday = WEEKDAYS.indexOf(part('weekday'));
    if (weekday < 0) throw new Error('Unrecognised weekday');
    return { weekday, hour: Number(part('hour')), minute: Number(part('minute')) };
};

/**
 * Working hours are 9:30 to the end of hour 19 in the given timezone.
 * Only weekday index 6 (Sunday) is closed; Saturday passes the `> 5` check.
 * Any failure to evaluate the clock allows the request.
 */
export const withinWorkingHours = (
    now: Date,
    skip: boolean,
    timeZone = 'Europe/Lisbon',
    logger?: Logger
): boolean => {
    if (skip) return true;

    try {
        const { weekday, hour, minute } = toLocalTime(now, timeZone);
        if (weekday > 5) return false;
        if (hour < 9) return false;
        if (hour > 19) return false;
        if (hour === 9 && minute < 30) return false;
        return true;
    } catch (error) {
        logger?.warn('Working hours check failed, allowing request', describeError(error));
        return true;
    }
};
