import { Database } from 'sqlite';
import { DEFAULT_FLOW_SETTINGS, FlowSettings } from '../src/config';
import { initDB } from '../src/db/db';
import { ItemRepository } from '../src/db/itemRepository';
import { UserRepository } from '../src/db/userRepository';
import { Conversation } from '../src/flow/context';
import { FlowEngine } from '../src/flow/engine';
import { Reply } from '../src/flow/replies';
import { Logger } from '../src/utils/logger';

export interface TestEnv {
    db: Database;
    items: ItemRepository;
    users: UserRepository;
    logger: Logger;
    settings: FlowSettings;
    engine: FlowEngine;
}

export const CHAT = 100;
export const ALICE = 5;
export const BOB = 7;
export const ADMIN = 1;

export const conv = (userId: number | null, chatId = CHAT): Conversation => ({ chatId, userId });

export const setupEnv = async (overrides: Partial<FlowSettings> = {}): Promise<TestEnv> => {
    const db = await initDB(':memory:');
    const items = new ItemRepository(db);
    const users = new UserRepository(db);
    const logger = new Logger({ silent: true });
    const settings: FlowSettings = { ...DEFAULT_FLOW_SETTINGS, fallbackAdminIds: [ADMIN], ...overrides };
    const engine = new FlowEngine({ items, users, settings, logger });
    return { db, items, users, logger, settings, engine };
};

/** Text of every reply, documents by file path. */
export const texts = (replies: Reply[] | null): string[] =>
    (replies ?? []).map(r => (r.kind === 'text' ? r.text : r.filePath));

export const firstText = (replies: Reply[] | null): string => texts(replies)[0] ?? '';
