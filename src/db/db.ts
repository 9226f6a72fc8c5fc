import sqlite3 from 'sqlite3';
import { open, Database } from 'sqlite';
import path from 'path';
import fs from 'fs';
import { ROLE_NAMES } from './types';
import { Logger } from '../utils/logger';

const MEMORY = ':memory:';

export const initDB = async (filename: string, logger?: Logger): Promise<Database> => {
    if (filename !== MEMORY) {
        const dataDir = path.dirname(filename);
        if (!fs.existsSync(dataDir)) {
            fs.mkdirSync(dataDir, { recursive: true });
        }
    }

    const db = await open({
        filename,
        driver: sqlite3.Database
    });

    await db.exec('PRAGMA foreign_keys = ON;');

    await db.exec(`
        CREATE TABLE IF NOT EXISTS roles (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            name TEXT NOT NULL UNIQUE
        );
    `);

    await db.exec(`
        CREATE TABLE IF NOT EXISTS users (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            telegram_user_id INTEGER NOT NULL UNIQUE,
            role_id INTEGER NOT NULL REFERENCES roles(id),
            created_at TEXT NOT NULL,
            credentials_encrypted TEXT
        );
    `);

    await db.exec(`
        CREATE TABLE IF NOT EXISTS items (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            name TEXT NOT NULL,
            amount INTEGER NOT NULL,
            type TEXT NOT NULL,
            price REAL,
            available INTEGER NOT NULL DEFAULT 0,
            chat_id INTEGER NOT NULL,
            created_by_user_id INTEGER,
            created_at TEXT NOT NULL
        );
    `);

    // Tables created before ownership tracking have no creator column
    const columns = await db.all<{ name: string }[]>(`PRAGMA table_info(items);`);
    if (!columns.some(c => c.name === 'created_by_user_id')) {
        await db.exec(`ALTER TABLE items ADD COLUMN created_by_user_id INTEGER;`);
        logger?.info('Added created_by_user_id column to items');
    }

    await db.exec(`CREATE INDEX IF NOT EXISTS idx_items_chat_name ON items(chat_id, name COLLATE NOCASE);`);
    await db.exec(`CREATE INDEX IF NOT EXISTS idx_items_created_by ON items(created_by_user_id);`);

    for (const role of ROLE_NAMES) {
        await db.run(`INSERT OR IGNORE INTO roles (name) VALUES (?)`, [role]);
    }

    logger?.debug('Database initialized');
    return db;
};
