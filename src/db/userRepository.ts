import { Database } from 'sqlite';
import { DuplicateUserError, isRoleName, RoleName, User, UserStore } from './types';

interface UserRow {
    id: number;
    telegram_user_id: number;
    role_name: string;
    created_at: string;
    credentials_encrypted: string | null;
}

const SELECT_USER = `
    SELECT u.id, u.telegram_user_id, r.name AS role_name, u.created_at, u.credentials_encrypted
    FROM users u
    JOIN roles r ON r.id = u.role_id
`;

const toUser = (row: UserRow): User => {
    if (!isRoleName(row.role_name)) {
        throw new Error(`Unknown role "${row.role_name}" for user ${row.telegram_user_id}`);
    }
    return {
        id: row.id,
        telegramUserId: row.telegram_user_id,
        role: row.role_name,
        createdAt: row.created_at,
        credentialsEncrypted: row.credentials_encrypted
    };
};

const isUniqueViolation = (error: unknown): boolean =>
    error instanceof Error && /UNIQUE constraint failed/.test(error.message);

export class UserRepository implements UserStore {
    constructor(private readonly db: Database) {}

    private async roleId(role: RoleName): Promise<number> {
        const row = await this.db.get<{ id: number }>('SELECT id FROM roles WHERE name = ?', [role]);
        if (!row) {
            throw new Error(`Role "${role}" is not seeded`);
        }
        return row.id;
    }

    async getByExternalId(telegramUserId: number): Promise<User | undefined> {
        const row = await this.db.get<UserRow>(`${SELECT_USER} WHERE u.telegram_user_id = ?`, [telegramUserId]);
        return row ? toUser(row) : undefined;
    }

    async create(telegramUserId: number, role: RoleName): Promise<User> {
        const roleId = await this.roleId(role);
        try {
            await this.db.run(
                'INSERT INTO users (telegram_user_id, role_id, created_at) VALUES (?, ?, ?)',
                [telegramUserId, roleId, new Date().toISOString()]
            );
        } catch (error) {
            if (isUniqueViolation(error)) {
                throw new DuplicateUserError(telegramUserId);
            }
            throw error;
        }
        const created = await this.getByExternalId(telegramUserId);
        if (!created) {
            throw new Error(`User ${telegramUserId} missing after insert`);
        }
        return created;
    }

    async setRole(telegramUserId: number, role: RoleName): Promise<User | undefined> {
        const roleId = await this.roleId(role);
        const result = await this.db.run(
            'UPDATE users SET role_id = ? WHERE telegram_user_id = ?',
            [roleId, telegramUserId]
        );
        if ((result.changes ?? 0) === 0) return undefined;
        return this.getByExternalId(telegramUserId);
    }

    async delete(telegramUserId: number): Promise<boolean> {
        const result = await this.db.run('DELETE FROM users WHERE telegram_user_id = ?', [telegramUserId]);
        return (result.changes ?? 0) > 0;
    }

    async list(limit = 100): Promise<User[]> {
        const rows = await this.db.all<UserRow[]>(`${SELECT_USER} ORDER BY u.created_at DESC, u.id DESC LIMIT ?`, [limit]);
        return rows.map(toUser);
    }
}
