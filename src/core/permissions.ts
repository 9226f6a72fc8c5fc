import { RoleName, UserStore } from '../db/types';
import { describeError, Logger } from '../utils/logger';

/**
 * Role for a Telegram user id: the stored role when the user is registered,
 * otherwise `admin` for fallback admin ids and `user` for everyone else.
 * A failing store is treated like a missing user.
 */
export const resolveRole = async (
    userId: number | null,
    users: Pick<UserStore, 'getByExternalId'>,
    fallbackAdminIds: readonly number[],
    logger: Logger
): Promise<RoleName | null> => {
    if (userId === null) return null;

    try {
        const user = await users.getByExternalId(userId);
        if (user) return user.role;
    } catch (error) {
        logger.warn('Could not resolve role from store', { userId, ...describeError(error) });
    }

    return fallbackAdminIds.includes(userId) ? 'admin' : 'user';
};

export const isAdminRole = (role: string | null): boolean => role === 'admin';

/** Items without a creator can only be managed by admins. */
export const canManageItem = (
    createdBy: number | null,
    currentUser: number | null,
    role: string | null
): boolean => {
    if (currentUser === null || role === null) return false;
    if (role === 'admin') return true;
    if (role === 'user') {
        return createdBy !== null && createdBy === currentUser;
    }
    return false;
};

export type ItemScope =
    | { kind: 'chat' }
    | { kind: 'creator'; creatorId: number };

/** Rows a bulk update or delete may touch; null when the caller has no rights. */
export const itemScope = (role: string | null, userId: number | null): ItemScope | null => {
    if (role === 'admin') return { kind: 'chat' };
    if (role === 'user' && userId !== null) return { kind: 'creator', creatorId: userId };
    return null;
};

export const scopeCreatorId = (scope: ItemScope): number | undefined =>
    scope.kind === 'creator' ? scope.creatorId : undefined;
