import { Context } from 'grammy';
import { InboundEvent } from './dispatcher';

const COMMAND = /^\/([A-Za-z0-9_]+)(?:@(\w+))?(?:\s|$)/;

export type CommandMatch =
    | { addressed: true; name: string }
    | { addressed: false };

/** Command named in a message; null for plain text. `/cmd@OtherBot` is not addressed to us. */
export const matchCommand = (body: string, botUsername: string): CommandMatch | null => {
    const match = COMMAND.exec(body);
    if (!match) return null;
    const [, name, target] = match;
    if (target !== undefined && target.toLowerCase() !== botUsername.toLowerCase()) {
        return { addressed: false };
    }
    return { addressed: true, name: name.toLowerCase() };
};

/** Reduces a grammY update to an inbound event; null for updates the bot ignores. */
export const toInboundEvent = (ctx: Context): InboundEvent | null => {
    const chatId = ctx.chat?.id;
    if (chatId === undefined) return null;
    const userId = ctx.from?.id ?? null;

    const data = ctx.callbackQuery?.data;
    if (data !== undefined) {
        return { chatId, userId, kind: 'button', payload: data };
    }

    const body = ctx.message?.text;
    if (body === undefined) return null;

    const command = matchCommand(body, ctx.me.username);
    if (!command) {
        return { chatId, userId, kind: 'text', payload: body };
    }
    return command.addressed ? { chatId, userId, kind: 'command', payload: command.name } : null;
};
