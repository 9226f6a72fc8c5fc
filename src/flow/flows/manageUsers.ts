import { isAdminRole } from '../../core/permissions';
import { DuplicateUserError, isRoleName, RoleName } from '../../db/types';
import { ManageUsersOp } from '../actions';
import { finish, FlowContext, FlowInput, moveTo, roleOf, storageFault, Transition } from '../context';
import { addUserRoleButtons, afterAdminButtons, setUserRoleButtons } from '../keyboards';
import {
    ADMIN_ONLY,
    ASK_ADD_USER_ID,
    ASK_REMOVE_USER_ID,
    ASK_SET_ROLE_USER_ID,
    chooseRole,
    INVALID_ROLE,
    INVALID_USER_ID,
    NO_USERS,
    retry,
    roleChanged,
    userAdded,
    userExists,
    userList,
    userNotFound,
    userRemoved
} from '../messages';
import { Button, prompt, Reply, text } from '../replies';
import { ManageUsersState } from '../state';

const USER_LIST_LIMIT = 50;

const isAdmin = async (ctx: FlowContext): Promise<boolean> => isAdminRole(await roleOf(ctx));

const parseUserId = (input: string): number | null => {
    const value = input.trim();
    if (!/^\d+$/.test(value)) return null;
    const id = Number(value);
    return Number.isSafeInteger(id) ? id : null;
};

const parseRole = (input: FlowInput): RoleName | null => {
    if (input.kind === 'action') {
        const { action } = input;
        return action.type === 'addUserRole' || action.type === 'setUserRole' ? action.role : null;
    }
    const value = input.text.trim().toLowerCase();
    return isRoleName(value) ? value : null;
};

const done = (body: string): Transition => finish(text(body, afterAdminButtons()));

const askRole = (telegramUserId: number, buttons: Button[][], problem?: string): Reply => {
    const question = chooseRole(telegramUserId);
    return text(problem ? retry(problem, question) : question, buttons);
};

export const listUsers = async (ctx: FlowContext): Promise<Reply[]> => {
    if (!(await isAdmin(ctx))) return [text(ADMIN_ONLY)];
    try {
        const users = await ctx.users.list(USER_LIST_LIMIT);
        return [text(users.length === 0 ? NO_USERS : userList(users), afterAdminButtons())];
    } catch (error) {
        return [storageFault(ctx, 'User list', error)];
    }
};

export const enterManageUsers = async (op: Exclude<ManageUsersOp, 'list'>, ctx: FlowContext): Promise<Transition> => {
    if (!(await isAdmin(ctx))) return finish(text(ADMIN_ONLY));
    switch (op) {
        case 'add': return moveTo({ flow: 'manageUsers', step: 'addId' }, prompt(ASK_ADD_USER_ID));
        case 'setRole': return moveTo({ flow: 'manageUsers', step: 'setRoleId' }, prompt(ASK_SET_ROLE_USER_ID));
        case 'remove': return moveTo({ flow: 'manageUsers', step: 'removeId' }, prompt(ASK_REMOVE_USER_ID));
    }
};

const idQuestion = (state: ManageUsersState): string => {
    switch (state.step) {
        case 'setRoleId': return ASK_SET_ROLE_USER_ID;
        case 'removeId': return ASK_REMOVE_USER_ID;
        default: return ASK_ADD_USER_ID;
    }
};

const commitRole = async (
    state: ManageUsersState,
    telegramUserId: number,
    role: RoleName,
    ctx: FlowContext
): Promise<Transition> => {
    if (state.step === 'addRole') {
        try {
            const user = await ctx.users.create(telegramUserId, role);
            ctx.logger.info('User added', { userId: ctx.conv.userId, action: `add:${user.role}` });
            return done(userAdded(user));
        } catch (error) {
            if (error instanceof DuplicateUserError) return done(userExists(telegramUserId));
            return finish(storageFault(ctx, 'User create', error));
        }
    }

    try {
        const user = await ctx.users.setRole(telegramUserId, role);
        if (!user) return done(userNotFound(telegramUserId));
        ctx.logger.info('User role changed', { userId: ctx.conv.userId, action: `setRole:${user.role}` });
        return done(roleChanged(user));
    } catch (error) {
        return finish(storageFault(ctx, 'User role update', error));
    }
};

const handleId = async (state: ManageUsersState, telegramUserId: number, ctx: FlowContext): Promise<Transition> => {
    try {
        if (state.step === 'removeId') {
            const removed = await ctx.users.delete(telegramUserId);
            if (!removed) return done(userNotFound(telegramUserId));
            ctx.logger.info('User removed', { userId: ctx.conv.userId, action: 'remove' });
            return done(userRemoved(telegramUserId));
        }

        const existing = await ctx.users.getByExternalId(telegramUserId);
        if (state.step === 'addId') {
            if (existing) return done(userExists(telegramUserId));
            return moveTo(
                { flow: 'manageUsers', step: 'addRole', telegramUserId },
                askRole(telegramUserId, addUserRoleButtons())
            );
        }

        if (!existing) return done(userNotFound(telegramUserId));
        return moveTo(
            { flow: 'manageUsers', step: 'setRoleChoice', telegramUserId },
            askRole(telegramUserId, setUserRoleButtons())
        );
    } catch (error) {
        return finish(storageFault(ctx, 'User lookup', error));
    }
};

export const stepManageUsers = async (
    state: ManageUsersState,
    input: FlowInput,
    ctx: FlowContext
): Promise<Transition> => {
    if (!(await isAdmin(ctx))) return finish(text(ADMIN_ONLY));

    if (state.step === 'addRole' || state.step === 'setRoleChoice') {
        const buttons = state.step === 'addRole' ? addUserRoleButtons() : setUserRoleButtons();
        const role = parseRole(input);
        if (!role) return moveTo(state, askRole(state.telegramUserId, buttons, INVALID_ROLE));
        return commitRole(state, state.telegramUserId, role, ctx);
    }

    const question = idQuestion(state);
    if (input.kind !== 'text') return moveTo(state, prompt(question));
    const telegramUserId = parseUserId(input.text);
    if (telegramUserId === null) return moveTo(state, prompt(retry(INVALID_USER_ID, question)));
    return handleId(state, telegramUserId, ctx);
};
