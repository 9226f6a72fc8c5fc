import { Bot } from 'grammy';
import { describeError, Logger } from '../utils/logger';
import { Dispatcher } from './dispatcher';
import { registerHandlers } from './handlers';

export const createBot = (token: string, dispatcher: Dispatcher, logger: Logger): Bot => {
    const bot = new Bot(token);

    bot.use(async (ctx, next) => {
        const started = Date.now();
        await next();
        logger.debug('Update handled', {
            updateId: ctx.update.update_id,
            chatId: ctx.chat?.id,
            durationMs: Date.now() - started
        });
    });

    registerHandlers(bot, dispatcher, logger);

    // Error handling
    bot.catch((err) => {
        logger.error('Error in bot', {
            updateId: err.ctx.update.update_id,
            chatId: err.ctx.chat?.id,
            ...describeError(err.error)
        });
    });

    return bot;
};
