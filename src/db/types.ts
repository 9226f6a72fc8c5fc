export type RoleName = 'admin' | 'user';

export const ROLE_NAMES: readonly RoleName[] = ['admin', 'user'];

export const isRoleName = (value: string): value is RoleName =>
    ROLE_NAMES.some(name => name === value);

export interface Item {
    id: number;
    name: string;
    amount: number;
    type: string;
    price: number | null;
    available: boolean;
    chatId: number;
    createdByUserId: number | null;
    createdAt: string;
}

export interface NewItem {
    name: string;
    amount: number;
    type: string;
    price: number | null;
    available: boolean;
}

export type ItemPatch = Partial<NewItem>;

export interface ItemFilters {
    chatId?: number;
    /** Case-insensitive exact match. */
    name?: string;
    /** Case-insensitive substring match. */
    nameSubstring?: string;
    creatorId?: number;
    dateRange?: { from: Date; to: Date };
}

export interface ItemStore {
    create(item: NewItem, chatId: number, creatorId: number | null): Promise<Item>;
    getById(id: number): Promise<Item | undefined>;
    /** Newest first. */
    list(filters: ItemFilters, limit?: number): Promise<Item[]>;
    updateAvailability(name: string, available: boolean, chatId?: number, creatorId?: number): Promise<number>;
    deleteByNameAndChat(name: string, chatId: number, creatorId?: number): Promise<number>;
    updateById(id: number, patch: ItemPatch): Promise<Item | undefined>;
}

export interface User {
    id: number;
    telegramUserId: number;
    role: RoleName;
    createdAt: string;
    credentialsEncrypted: string | null;
}

export interface UserStore {
    getByExternalId(telegramUserId: number): Promise<User | undefined>;
    create(telegramUserId: number, role: RoleName): Promise<User>;
    setRole(telegramUserId: number, role: RoleName): Promise<User | undefined>;
    delete(telegramUserId: number): Promise<boolean>;
    list(limit?: number): Promise<User[]>;
}

export class DuplicateUserError extends Error {
    constructor(public readonly telegramUserId: number) {
        super(`User ${telegramUserId} already exists`);
        this.name = 'DuplicateUserError';
    }
}
