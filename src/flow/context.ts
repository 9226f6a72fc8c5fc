import { FlowSettings } from '../config';
import { resolveRole } from '../core/permissions';
import { ItemStore, RoleName, UserStore } from '../db/types';
import { describeError, Logger } from '../utils/logger';
import { FlowAction } from './actions';
import { STORAGE_FAULT } from './messages';
import { Reply, text } from './replies';
import { ConversationState } from './state';

export interface Conversation {
    chatId: number;
    userId: number | null;
}

export const conversationKey = (conv: Conversation): string => `${conv.chatId}:${conv.userId ?? 'anonymous'}`;

export interface FlowContext {
    conv: Conversation;
    items: ItemStore;
    users: UserStore;
    settings: FlowSettings;
    logger: Logger;
    now: () => Date;
}

export type FlowInput =
    | { kind: 'text'; text: string }
    | { kind: 'action'; action: FlowAction };

export interface Transition {
    state: ConversationState | null;
    replies: Reply[];
}

export const moveTo = (state: ConversationState, ...replies: Reply[]): Transition => ({ state, replies });

export const finish = (...replies: Reply[]): Transition => ({ state: null, replies });

export const roleOf = (ctx: FlowContext): Promise<RoleName | null> =>
    resolveRole(ctx.conv.userId, ctx.users, ctx.settings.fallbackAdminIds, ctx.logger);

/** Logs a failed store call without the user's input and returns the generic retry reply. */
export const storageFault = (ctx: FlowContext, operation: string, error: unknown): Reply => {
    ctx.logger.error(`${operation} failed`, {
        chatId: ctx.conv.chatId,
        userId: ctx.conv.userId,
        ...describeError(error)
    });
    return text(STORAGE_FAULT);
};
