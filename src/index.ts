import { ConfigError, loadSettings } from './config';
import { MemorySessionStorage } from 'grammy';
import { createBot } from './bot/bot';
import { Dispatcher } from './bot/dispatcher';
import { initDB } from './db/db';
import { ItemRepository } from './db/itemRepository';
import { UserRepository } from './db/userRepository';
import { FlowEngine } from './flow/engine';
import { ConversationState } from './flow/state';
import { describeError, Logger } from './utils/logger';

// Replaced once settings are loaded; reports configuration errors until then.
let logger = new Logger();

const main = async () => {
    const settings = loadSettings();
    logger = new Logger({ level: settings.logLevel, file: settings.logFile });
    if (!settings.botToken) {
        throw new ConfigError('BOT_TOKEN is missing');
    }

    const db = await initDB(settings.databasePath, logger);
    const items = new ItemRepository(db);
    const users = new UserRepository(db);

    const engine = new FlowEngine({
        items,
        users,
        settings: settings.flow,
        logger,
        storage: new MemorySessionStorage<ConversationState>(settings.conversationTtlMs)
    });

    let stopping = false;
    const shutdown = async (reason: string) => {
        if (stopping) return;
        stopping = true;
        logger.info('Bot stopping...', { action: reason });
        await bot.stop();
    };
    const requestShutdown = (reason: string) => {
        shutdown(reason).catch((error: unknown) => logger.error('Failed to stop bot', describeError(error)));
    };

    const dispatcher = new Dispatcher({
        engine,
        items,
        users,
        settings,
        logger,
        onStop: () => requestShutdown('stop command')
    });
    const bot = createBot(settings.botToken, dispatcher, logger);

    process.once('SIGINT', () => requestShutdown('SIGINT'));
    process.once('SIGTERM', () => requestShutdown('SIGTERM'));

    logger.info('Bot starting...');
    await bot.start({
        onStart: (info) => logger.info(`Bot @${info.username} is running`)
    });

    await db.close();
    logger.info('Bot stopped');
};

main().catch((error: unknown) => {
    logger.error('Bot failed to start', describeError(error));
    process.exit(1);
});
