import { Database } from 'sqlite';
import { Item, ItemFilters, ItemPatch, ItemStore, NewItem } from './types';

interface ItemRow {
    id: number;
    name: string;
    amount: number;
    type: string;
    price: number | null;
    available: number;
    chat_id: number;
    created_by_user_id: number | null;
    created_at: string;
}

const toItem = (row: ItemRow): Item => ({
    id: row.id,
    name: row.name,
    amount: row.amount,
    type: row.type,
    price: row.price,
    available: row.available === 1,
    chatId: row.chat_id,
    createdByUserId: row.created_by_user_id,
    createdAt: row.created_at
});

const escapeLike = (value: string): string => value.replace(/[\\%_]/g, m => `\\${m}`);

// Patchable fields share their column names
const PATCH_FIELDS: (keyof NewItem)[] = ['name', 'amount', 'type', 'price', 'available'];

const toColumnValue = (value: NewItem[keyof NewItem]): string | number | null =>
    typeof value === 'boolean' ? (value ? 1 : 0) : value;

export class ItemRepository implements ItemStore {
    constructor(private readonly db: Database) {}

    async create(item: NewItem, chatId: number, creatorId: number | null): Promise<Item> {
        const result = await this.db.run(
            `INSERT INTO items (name, amount, type, price, available, chat_id, created_by_user_id, created_at)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
            [
                item.name,
                item.amount,
                item.type,
                item.price,
                item.available ? 1 : 0,
                chatId,
                creatorId,
                new Date().toISOString()
            ]
        );
        if (result.lastID === undefined) {
            throw new Error('Item insert returned no id');
        }
        const created = await this.getById(result.lastID);
        if (!created) {
            throw new Error(`Item ${result.lastID} missing after insert`);
        }
        return created;
    }

    async getById(id: number): Promise<Item | undefined> {
        const row = await this.db.get<ItemRow>('SELECT * FROM items WHERE id = ?', [id]);
        return row ? toItem(row) : undefined;
    }

    async list(filters: ItemFilters, limit = 100): Promise<Item[]> {
        const where: string[] = [];
        const params: (string | number)[] = [];

        if (filters.chatId !== undefined) {
            where.push('chat_id = ?');
            params.push(filters.chatId);
        }
        if (filters.name !== undefined) {
            where.push('name = ? COLLATE NOCASE');
            params.push(filters.name);
        }
        if (filters.nameSubstring) {
            where.push(`name LIKE ? ESCAPE '\\'`);
            params.push(`%${escapeLike(filters.nameSubstring)}%`);
        }
        if (filters.creatorId !== undefined) {
            where.push('created_by_user_id = ?');
            params.push(filters.creatorId);
        }
        if (filters.dateRange) {
            where.push('created_at >= ? AND created_at <= ?');
            params.push(filters.dateRange.from.toISOString(), filters.dateRange.to.toISOString());
        }

        const clause = where.length > 0 ? `WHERE ${where.join(' AND ')}` : '';
        const rows = await this.db.all<ItemRow[]>(
            `SELECT * FROM items ${clause} ORDER BY created_at DESC, id DESC LIMIT ?`,
            [...params, limit]
        );
        return rows.map(toItem);
    }

    async updateAvailability(name: string, available: boolean, chatId?: number, creatorId?: number): Promise<number> {
        const where = ['name = ? COLLATE NOCASE'];
        const params: (string | number)[] = [available ? 1 : 0, name];

        if (chatId !== undefined) {
            where.push('chat_id = ?');
            params.push(chatId);
        }
        if (creatorId !== undefined) {
            where.push('created_by_user_id = ?');
            params.push(creatorId);
        }

        const result = await this.db.run(
            `UPDATE items SET available = ? WHERE ${where.join(' AND ')}`,
            params
        );
        return result.changes ?? 0;
    }

    async deleteByNameAndChat(name: string, chatId: number, creatorId?: number): Promise<number> {
        const result = creatorId === undefined
            ? await this.db.run(
                'DELETE FROM items WHERE chat_id = ? AND name = ? COLLATE NOCASE',
                [chatId, name]
            )
            : await this.db.run(
                'DELETE FROM items WHERE chat_id = ? AND name = ? COLLATE NOCASE AND created_by_user_id = ?',
                [chatId, name, creatorId]
            );
        return result.changes ?? 0;
    }

    async updateById(id: number, patch: ItemPatch): Promise<Item | undefined> {
        const sets: string[] = [];
        const params: (string | number | null)[] = [];

        for (const key of PATCH_FIELDS) {
            const value = patch[key];
            if (value === undefined) continue;
            sets.push(`${key} = ?`);
            params.push(toColumnValue(value));
        }

        if (sets.length > 0) {
            const result = await this.db.run(
                `UPDATE items SET ${sets.join(', ')} WHERE id = ?`,
                [...params, id]
            );
            if ((result.changes ?? 0) === 0) return undefined;
        }
        return this.getById(id);
    }
}
