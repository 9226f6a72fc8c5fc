import { Bot, Context, InlineKeyboard, InputFile, Keyboard } from 'grammy';
import fs from 'fs';
import { encodeAction } from '../flow/actions';
import { Button, DocumentReply, Reply, TextReply } from '../flow/replies';
import { describeError, Logger } from '../utils/logger';
import { toInboundEvent } from './context';
import { Dispatcher } from './dispatcher';

const inlineKeyboard = (rows: Button[][]): InlineKeyboard => {
    const keyboard = new InlineKeyboard();
    rows.forEach((row, index) => {
        if (index > 0) keyboard.row();
        row.forEach(button => keyboard.text(button.label, encodeAction(button.action)));
    });
    return keyboard;
};

const replyKeyboard = (rows: string[][]): Keyboard => {
    const keyboard = new Keyboard();
    rows.forEach((row, index) => {
        if (index > 0) keyboard.row();
        row.forEach(label => keyboard.text(label));
    });
    return keyboard.resized();
};

const sendText = async (ctx: Context, reply: TextReply): Promise<void> => {
    if (reply.buttons) {
        await ctx.reply(reply.text, { reply_markup: inlineKeyboard(reply.buttons) });
    } else if (reply.keyboard) {
        await ctx.reply(reply.text, { reply_markup: replyKeyboard(reply.keyboard) });
    } else if (reply.forceReply) {
        await ctx.reply(reply.text, { reply_markup: { force_reply: true } });
    } else {
        await ctx.reply(reply.text);
    }
};

const sendDocument = async (ctx: Context, reply: DocumentReply, logger: Logger): Promise<void> => {
    try {
        await ctx.replyWithDocument(new InputFile(reply.filePath), { caption: reply.caption });
    } finally {
        if (reply.temporary) {
            await fs.promises.unlink(reply.filePath).catch((error: unknown) => {
                logger.warn('Could not remove temporary file', describeError(error));
            });
        }
    }
};

export const sendReplies = async (ctx: Context, replies: Reply[], logger: Logger): Promise<void> => {
    for (const reply of replies) {
        if (reply.kind === 'text') {
            await sendText(ctx, reply);
        } else {
            await sendDocument(ctx, reply, logger);
        }
    }
};

const handle = async (ctx: Context, dispatcher: Dispatcher, logger: Logger): Promise<void> => {
    const event = toInboundEvent(ctx);
    if (!event) return;
    const replies = await dispatcher.dispatch(event);
    await sendReplies(ctx, replies, logger);
};

export const registerHandlers = (bot: Bot, dispatcher: Dispatcher, logger: Logger): void => {
    bot.on('callback_query:data', async (ctx) => {
        await ctx.answerCallbackQuery();
        await handle(ctx, dispatcher, logger);
    });

    bot.on('message:text', async (ctx) => {
        await handle(ctx, dispatcher, logger);
    });
};
