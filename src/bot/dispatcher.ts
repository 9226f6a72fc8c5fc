import { Settings } from '../config';
import { isAdminRole } from '../core/permissions';
import { DuplicateUserError, Item, ItemStore, UserStore } from '../db/types';
import { generateItemReport } from '../excel/report';
import { isFlowAction, NavigationAction, parseAction } from '../flow/actions';
import { Conversation, conversationKey, roleOf, storageFault } from '../flow/context';
import { FlowEngine } from '../flow/engine';
import { listUsers } from '../flow/flows/manageUsers';
import { KeyedLock } from '../flow/keyedLock';
import { adminPanelButtons, MAIN_KEYBOARD, mainLabelAction, menuButtons } from '../flow/keyboards';
import {
    ADMIN_ONLY,
    ADMIN_PANEL,
    HELP,
    itemAdded,
    itemList,
    MENU,
    NO_ITEMS,
    notAuthorizedToStop,
    NOT_UNDERSTOOD,
    STOPPING,
    UNKNOWN_ACTION,
    WELCOME
} from '../flow/messages';
import { Reply, text } from '../flow/replies';
import { describeError, Logger } from '../utils/logger';

export type EventKind = 'command' | 'text' | 'button';

/** One inbound update, already stripped of everything platform specific. */
export interface InboundEvent {
    chatId: number;
    userId: number | null;
    kind: EventKind;
    /** Command name without the slash, message text, or button payload. */
    payload: string;
}

export interface DispatcherDeps {
    engine: FlowEngine;
    items: ItemStore;
    users: UserStore;
    settings: Pick<Settings, 'authorizedIds' | 'reportsDir'>;
    logger: Logger;
    /** Called after an authorized stop request. */
    onStop?: () => void;
    lock?: KeyedLock;
}

const LIST_LIMIT = 50;
const EXPORT_LIMIT = 10000;

export class Dispatcher {
    private lock: KeyedLock;

    constructor(private deps: DispatcherDeps) {
        this.lock = deps.lock ?? new KeyedLock();
    }

    async dispatch(event: InboundEvent): Promise<Reply[]> {
        const conv: Conversation = { chatId: event.chatId, userId: event.userId };
        const key = conversationKey(conv);

        if (event.kind === 'command' && event.payload === 'cancel') {
            this.deps.engine.interrupt(conv);
            return this.lock.run(key, () => this.deps.engine.cancel(conv));
        }

        return this.lock.run(key, async () => {
            try {
                return await this.route(event, conv);
            } catch (error) {
                return [storageFault(this.deps.engine.context(conv), `Handling ${event.kind}`, error)];
            }
        });
    }

    private route(event: InboundEvent, conv: Conversation): Promise<Reply[]> {
        this.deps.logger.debug('Inbound event', { chatId: conv.chatId, userId: conv.userId, action: event.kind });

        switch (event.kind) {
            case 'command': return this.command(event.payload, conv);
            case 'text': return this.text(event.payload, conv);
            case 'button': return this.button(event.payload, conv);
        }
    }

    private async command(name: string, conv: Conversation): Promise<Reply[]> {
        switch (name) {
            case 'start': return this.start(conv);
            case 'menu': return this.navigate({ type: 'menu' }, conv);
            case 'help': return [text(HELP)];
            case 'stop': return this.navigate({ type: 'stop' }, conv);
            case 'get': return this.navigate({ type: 'listItems' }, conv);
            case 'report': return this.navigate({ type: 'exportItems' }, conv);
            default: return [text(NOT_UNDERSTOOD)];
        }
    }

    private async text(body: string, conv: Conversation): Promise<Reply[]> {
        const label = mainLabelAction(body);
        if (label) return this.navigate(label, conv);

        const replies = await this.deps.engine.handleText(conv, body);
        return replies ?? [text(NOT_UNDERSTOOD)];
    }

    private async button(payload: string, conv: Conversation): Promise<Reply[]> {
        const action = parseAction(payload);
        if (!action) {
            this.deps.logger.debug('Unknown button payload', { chatId: conv.chatId, userId: conv.userId });
            return [text(UNKNOWN_ACTION)];
        }
        if (isFlowAction(action)) return this.deps.engine.handleAction(conv, action);
        return this.navigate(action, conv);
    }

    private async navigate(action: NavigationAction, conv: Conversation): Promise<Reply[]> {
        const { engine } = this.deps;
        switch (action.type) {
            case 'menu':
                await engine.clear(conv);
                return [text(MENU, menuButtons())];
            case 'listItems': return this.listItems(conv);
            case 'startAdd': return engine.start(conv, { flow: 'addItem' });
            case 'startUpdate': return engine.start(conv, { flow: 'updateItem' });
            case 'startRemove': return engine.start(conv, { flow: 'removeItem' });
            case 'startAvailability': return engine.start(conv, { flow: 'availability' });
            case 'adminPanel': return this.adminPanel(conv);
            case 'testMessage': return this.testMessage(conv);
            case 'exportItems': return this.exportItems(conv);
            case 'stop': return this.stop(conv);
            case 'manageUsers':
                if (action.op === 'list') return listUsers(engine.context(conv));
                return engine.start(conv, { flow: 'manageUsers', op: action.op });
        }
    }

    private async start(conv: Conversation): Promise<Reply[]> {
        await this.deps.engine.clear(conv);
        await this.registerUser(conv);
        return [{ kind: 'text', text: WELCOME, keyboard: MAIN_KEYBOARD }];
    }

    /** First /start registers the caller as a plain user; fallback admins stay unregistered. */
    private async registerUser(conv: Conversation): Promise<void> {
        const { userId } = conv;
        if (userId === null) return;
        if (this.deps.engine.settings.fallbackAdminIds.includes(userId)) return;

        try {
            const existing = await this.deps.users.getByExternalId(userId);
            if (existing) return;
            await this.deps.users.create(userId, 'user');
            this.deps.logger.info('User registered', { chatId: conv.chatId, userId });
        } catch (error) {
            if (error instanceof DuplicateUserError) return;
            this.deps.logger.warn('Could not register user', { chatId: conv.chatId, userId, ...describeError(error) });
        }
    }

    private async listItems(conv: Conversation): Promise<Reply[]> {
        const items = await this.deps.items.list({ chatId: conv.chatId }, LIST_LIMIT);
        return [text(items.length === 0 ? NO_ITEMS : itemList(items))];
    }

    private async adminPanel(conv: Conversation): Promise<Reply[]> {
        const ctx = this.deps.engine.context(conv);
        if (!isAdminRole(await roleOf(ctx))) return [text(ADMIN_ONLY)];
        await this.deps.engine.clear(conv);
        return [text(ADMIN_PANEL, adminPanelButtons())];
    }

    /** Stores a fixed sample item so a chat can check the bot end to end. */
    private async testMessage(conv: Conversation): Promise<Reply[]> {
        const settings = this.deps.engine.settings;
        const item: Item = await this.deps.items.create(
            { name: 'My Item', amount: 1, type: settings.allowedTypes[0], price: 0.01, available: true },
            conv.chatId,
            conv.userId
        );
        this.deps.logger.info('Test item created', { chatId: conv.chatId, userId: conv.userId, itemId: item.id });
        return [text(itemAdded(item, settings), menuButtons())];
    }

    private async exportItems(conv: Conversation): Promise<Reply[]> {
        const items = await this.deps.items.list({ chatId: conv.chatId }, EXPORT_LIMIT);
        if (items.length === 0) return [text(NO_ITEMS)];

        const filePath = await generateItemReport(items, this.deps.settings.reportsDir, conv.chatId);
        this.deps.logger.info('Report generated', { chatId: conv.chatId, userId: conv.userId, count: items.length });
        return [{ kind: 'document', filePath, caption: `Items: ${items.length}`, temporary: true }];
    }

    private async stop(conv: Conversation): Promise<Reply[]> {
        if (!this.deps.settings.authorizedIds.includes(conv.chatId)) {
            this.deps.logger.warn('Unauthorized stop request', { chatId: conv.chatId, userId: conv.userId });
            return [text(notAuthorizedToStop(conv.chatId))];
        }
        await this.deps.engine.clear(conv);
        this.deps.logger.info('Stop requested', { chatId: conv.chatId, userId: conv.userId });
        this.deps.onStop?.();
        return [text(STOPPING)];
    }
}
