import dotenv from 'dotenv';

dotenv.config();

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/** Everything the conversational flows need; a new engine is built to apply a new value. */
export interface FlowSettings {
    allowedTypes: string[];
    /** Types whose confirmation also shows price and availability. */
    detailedTypes: string[];
    minNameLength: number;
    maxNameLength: number;
    maxItemAmount: number;
    maxItemPrice: number;
    skipWorkingHours: boolean;
    workingHoursTimeZone: string;
    fallbackAdminIds: number[];
}

export interface Settings {
    botToken?: string;
    databasePath: string;
    logLevel: string;
    logFile?: string;
    reportsDir: string;
    /** Chat ids allowed to stop the bot. */
    authorizedIds: number[];
    conversationTtlMs?: number;
    flow: FlowSettings;
}

export const DEFAULT_FLOW_SETTINGS: FlowSettings = {
    allowedTypes: ['spare part', 'miscellaneous'],
    detailedTypes: ['spare part'],
    minNameLength: 1,
    maxNameLength: 255,
    maxItemAmount: 100000,
    maxItemPrice: 1000000,
    skipWorkingHours: true,
    workingHoursTimeZone: 'Europe/Lisbon',
    fallbackAdminIds: []
};

// Telegram caps callback data at 64 bytes and type buttons carry the type name.
const MAX_TYPE_LENGTH = 40;

const parseList = (value: string): string[] =>
    value.split(',').map(v => v.trim()).filter(v => v.length > 0);

const parseIdList = (key: string, value: string | undefined): number[] => {
    if (!value) return [];
    return parseList(value).map(v => {
        const id = Number(v);
        if (!/^-?\d+$/.test(v) || !Number.isSafeInteger(id)) {
            throw new ConfigError(`${key} must be a comma-separated list of integers`);
        }
        return id;
    });
};

const parseNumber = (key: string, value: string | undefined, fallback: number, min: number): number => {
    if (value === undefined || value.trim() === '') return fallback;
    const num = Number(value);
    if (!Number.isFinite(num) || num < min) {
        throw new ConfigError(`${key} must be a number >= ${min}`);
    }
    return num;
};

const parseBoolean = (key: string, value: string | undefined, fallback: boolean): boolean => {
    if (value === undefined || value.trim() === '') return fallback;
    const normalized = value.trim().toLowerCase();
    if (['true', '1', 'yes'].includes(normalized)) return true;
    if (['false', '0', 'no'].includes(normalized)) return false;
    throw new ConfigError(`${key} must be true or false`);
};

const parseTypes = (key: string, value: string | undefined, fallback: string[]): string[] => {
    if (value === undefined) return fallback;
    const types = parseList(value).map(t => t.toLowerCase());
    if (types.some(t => t.length > MAX_TYPE_LENGTH)) {
        throw new ConfigError(`${key} entries must be at most ${MAX_TYPE_LENGTH} characters`);
    }
    return Array.from(new Set(types));
};

export const loadSettings = (env: NodeJS.ProcessEnv = process.env): Settings => {
    const allowedTypes = parseTypes('ALLOWED_TYPES', env.ALLOWED_TYPES, DEFAULT_FLOW_SETTINGS.allowedTypes);
    if (allowedTypes.length === 0) {
        throw new ConfigError('ALLOWED_TYPES must contain at least one type');
    }

    const minNameLength = parseNumber('MIN_NAME_LENGTH', env.MIN_NAME_LENGTH, DEFAULT_FLOW_SETTINGS.minNameLength, 1);
    const maxNameLength = parseNumber('MAX_NAME_LENGTH', env.MAX_NAME_LENGTH, DEFAULT_FLOW_SETTINGS.maxNameLength, 1);
    if (minNameLength > maxNameLength) {
        throw new ConfigError('MIN_NAME_LENGTH must not exceed MAX_NAME_LENGTH');
    }

    const ttl = env.CONVERSATION_TTL_MS
        ? parseNumber('CONVERSATION_TTL_MS', env.CONVERSATION_TTL_MS, 0, 1)
        : undefined;

    return {
        botToken: env.BOT_TOKEN || undefined,
        databasePath: env.DATABASE_PATH || './data/database.sqlite',
        logLevel: env.LOG_LEVEL || 'info',
        logFile: env.LOG_FILE || undefined,
        reportsDir: env.REPORTS_DIR || './temp',
        authorizedIds: parseIdList('AUTHORIZED_IDS', env.AUTHORIZED_IDS),
        conversationTtlMs: ttl,
        flow: {
            allowedTypes,
            detailedTypes: parseTypes('DETAILED_TYPES', env.DETAILED_TYPES, DEFAULT_FLOW_SETTINGS.detailedTypes),
            minNameLength,
            maxNameLength,
            maxItemAmount: parseNumber('MAX_ITEM_AMOUNT', env.MAX_ITEM_AMOUNT, DEFAULT_FLOW_SETTINGS.maxItemAmount, 1),
            maxItemPrice: parseNumber('MAX_ITEM_PRICE', env.MAX_ITEM_PRICE, DEFAULT_FLOW_SETTINGS.maxItemPrice, 0),
            skipWorkingHours: parseBoolean('SKIP_WORKING_HOURS', env.SKIP_WORKING_HOURS, DEFAULT_FLOW_SETTINGS.skipWorkingHours),
            workingHoursTimeZone: env.WORKING_HOURS_TIMEZONE || DEFAULT_FLOW_SETTINGS.workingHoursTimeZone,
            fallbackAdminIds: parseIdList('FALLBACK_ADMIN_IDS', env.FALLBACK_ADMIN_IDS)
        }
    };
};
