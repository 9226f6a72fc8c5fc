import { canManageItem, itemScope, resolveRole, scopeCreatorId } from '../src/core/permissions';
import { User } from '../src/db/types';
import { Logger } from '../src/utils/logger';

const logger = new Logger({ silent: true });

const storedUser = (telegramUserId: number, role: User['role']): User => ({
    id: 1,
    telegramUserId,
    role,
    createdAt: '2026-01-01T00:00:00.000Z',
    credentialsEncrypted: null
});

describe('resolveRole', () => {
    it('returns null for a missing user id without querying the store', async () => {
        const getByExternalId = jest.fn();
        await expect(resolveRole(null, { getByExternalId }, [1], logger)).resolves.toBeNull();
        expect(getByExternalId).not.toHaveBeenCalled();
    });

    it('returns the stored role', async () => {
        const getByExternalId = jest.fn().mockResolvedValue(storedUser(5, 'admin'));
        await expect(resolveRole(5, { getByExternalId }, [], logger)).resolves.toBe('admin');
        expect(getByExternalId).toHaveBeenCalledWith(5);
    });

    it('prefers the stored role over the fallback list', async () => {
        const getByExternalId = jest.fn().mockResolvedValue(storedUser(1, 'user'));
        await expect(resolveRole(1, { getByExternalId }, [1], logger)).resolves.toBe('user');
    });

    it('falls back to the admin list for unknown users', async () => {
        const getByExternalId = jest.fn().mockResolvedValue(undefined);
        await expect(resolveRole(1, { getByExternalId }, [1], logger)).resolves.toBe('admin');
        await expect(resolveRole(2, { getByExternalId }, [1], logger)).resolves.toBe('user');
    });

    it('treats a failing store like a missing user', async () => {
        const getByExternalId = jest.fn().mockRejectedValue(new Error('database is locked'));
        await expect(resolveRole(1, { getByExternalId }, [1], logger)).resolves.toBe('admin');
        await expect(resolveRole(2, { getByExternalId }, [1], logger)).resolves.toBe('user');
    });
});

describe('canManageItem', () => {
    it('lets users manage only their own items', () => {
        expect(canManageItem(5, 5, 'user')).toBe(true);
        expect(canManageItem(7, 5, 'user')).toBe(false);
        expect(canManageItem(null, 5, 'user')).toBe(false);
    });

    it('lets admins manage anything', () => {
        expect(canManageItem(7, 5, 'admin')).toBe(true);
        expect(canManageItem(null, 5, 'admin')).toBe(true);
    });

    it('denies without a user, a role or a known role', () => {
        expect(canManageItem(5, null, 'admin')).toBe(false);
        expect(canManageItem(5, 5, null)).toBe(false);
        expect(canManageItem(5, 5, 'guest')).toBe(false);
    });
});

describe('itemScope', () => {
    it('covers the chat for admins and own rows for users', () => {
        expect(itemScope('admin', 1)).toEqual({ kind: 'chat' });
        expect(itemScope('user', 5)).toEqual({ kind: 'creator', creatorId: 5 });
        expect(itemScope('user', null)).toBeNull();
        expect(itemScope(null, 5)).toBeNull();
    });

    it('maps a scope to the creator filter', () => {
        expect(scopeCreatorId({ kind: 'chat' })).toBeUndefined();
        expect(scopeCreatorId({ kind: 'creator', creatorId: 5 })).toBe(5);
    });
});
