import { MemorySessionStorage, StorageAdapter } from 'grammy';
import { FlowSettings } from '../config';
import { ItemStore, UserStore } from '../db/types';
import { Logger } from '../utils/logger';
import { FlowAction, ManageUsersOp } from './actions';
import { Conversation, conversationKey, FlowContext, FlowInput, Transition } from './context';
import { enterAddItem, stepAddItem } from './flows/addItem';
import { enterAvailability, stepAvailability } from './flows/availability';
import { enterManageUsers, stepManageUsers } from './flows/manageUsers';
import { enterRemoveItem, stepRemoveItem } from './flows/removeItem';
import { enterUpdateItem, stepUpdateItem } from './flows/updateItem';
import { CANCELLED, EXPIRED } from './messages';
import { Reply, text } from './replies';
import { ConversationState, expectedStateId, stateId } from './state';

export type FlowEntry =
    | { flow: 'addItem' }
    | { flow: 'updateItem' }
    | { flow: 'removeItem' }
    | { flow: 'availability' }
    | { flow: 'manageUsers'; op: Exclude<ManageUsersOp, 'list'> };

export interface FlowEngineDeps {
    items: ItemStore;
    users: UserStore;
    settings: FlowSettings;
    logger: Logger;
    /** Where conversation state lives; in memory unless given. */
    storage?: StorageAdapter<ConversationState>;
    now?: () => Date;
}

interface InFlight {
    generation: number;
    running: number;
}

export class FlowEngine {
    private storage: StorageAdapter<ConversationState>;
    /** Conversations with a transition running; dropped when the last one settles. */
    private inFlight = new Map<string, InFlight>();
    private now: () => Date;

    constructor(private deps: FlowEngineDeps) {
        this.storage = deps.storage ?? new MemorySessionStorage<ConversationState>();
        this.now = deps.now ?? (() => new Date());
    }

    get settings(): FlowSettings {
        return this.deps.settings;
    }

    /** Conversations with a transition still running. */
    get pending(): number {
        return this.inFlight.size;
    }

    /** Builds the context flows and one-shot actions run with. */
    context(conv: Conversation): FlowContext {
        const { items, users, settings, logger } = this.deps;
        return { conv, items, users, settings, logger, now: this.now };
    }

    async getState(conv: Conversation): Promise<ConversationState | undefined> {
        return this.storage.read(conversationKey(conv));
    }

    async clear(conv: Conversation): Promise<void> {
        await this.storage.delete(conversationKey(conv));
    }

    /** Supersedes whatever transition of this conversation is in flight; its state is not written. */
    interrupt(conv: Conversation): void {
        const entry = this.inFlight.get(conversationKey(conv));
        if (entry) entry.generation += 1;
    }

    /** Clears the conversation and supersedes any transition still in flight; safe to repeat. */
    async cancel(conv: Conversation): Promise<Reply[]> {
        this.interrupt(conv);
        await this.clear(conv);
        return [text(CANCELLED)];
    }

    async start(conv: Conversation, entry: FlowEntry): Promise<Reply[]> {
        return this.track(conv, async superseded => {
            await this.clear(conv);
            return this.run(conv, superseded, 'none', () => this.enter(entry, this.context(conv)));
        });
    }

    /** Continues the active flow; null when no flow is waiting for input. */
    async handleText(conv: Conversation, input: string): Promise<Reply[] | null> {
        return this.track(conv, async superseded => {
            const state = await this.getState(conv);
            if (!state) return null;
            const next = () => this.step(state, { kind: 'text', text: input }, this.context(conv));
            return this.run(conv, superseded, stateId(state), next);
        });
    }

    async handleAction(conv: Conversation, action: FlowAction): Promise<Reply[]> {
        return this.track(conv, async superseded => {
            const state = await this.getState(conv);
            const expected = expectedStateId(action);
            if (!state || stateId(state) !== expected) {
                this.deps.logger.debug('Expired action', {
                    chatId: conv.chatId,
                    userId: conv.userId,
                    action: action.type,
                    state: state ? stateId(state) : 'none'
                });
                return [text(EXPIRED)];
            }
            const next = () => this.step(state, { kind: 'action', action }, this.context(conv));
            return this.run(conv, superseded, expected, next);
        });
    }

    // The generation is taken before the first await so an interrupt issued meanwhile is seen.
    private async track<T>(conv: Conversation, work: (superseded: () => boolean) => Promise<T>): Promise<T> {
        const key = conversationKey(conv);
        const entry = this.inFlight.get(key) ?? { generation: 0, running: 0 };
        this.inFlight.set(key, entry);
        entry.running += 1;
        const generation = entry.generation;
        try {
            return await work(() => entry.generation !== generation);
        } finally {
            entry.running -= 1;
            if (entry.running === 0 && this.inFlight.get(key) === entry) this.inFlight.delete(key);
        }
    }

    private async run(
        conv: Conversation,
        superseded: () => boolean,
        from: string,
        transition: () => Promise<Transition>
    ): Promise<Reply[]> {
        const key = conversationKey(conv);
        const result = await transition();

        if (superseded()) {
            this.deps.logger.debug('Transition superseded', { chatId: conv.chatId, userId: conv.userId, state: from });
            return result.replies;
        }

        if (result.state) {
            await this.storage.write(key, result.state);
        } else {
            await this.storage.delete(key);
        }
        this.deps.logger.debug('Transition', {
            chatId: conv.chatId,
            userId: conv.userId,
            state: `${from} -> ${result.state ? stateId(result.state) : 'none'}`
        });
        return result.replies;
    }

    private enter(entry: FlowEntry, ctx: FlowContext): Promise<Transition> {
        switch (entry.flow) {
            case 'addItem': return enterAddItem(ctx);
            case 'updateItem': return enterUpdateItem();
            case 'removeItem': return enterRemoveItem();
            case 'availability': return enterAvailability();
            case 'manageUsers': return enterManageUsers(entry.op, ctx);
        }
    }

    private step(state: ConversationState, input: FlowInput, ctx: FlowContext): Promise<Transition> {
        switch (state.flow) {
            case 'addItem': return stepAddItem(state, input, ctx);
            case 'updateItem': return stepUpdateItem(state, input, ctx);
            case 'removeItem': return stepRemoveItem(state, input, ctx);
            case 'availability': return stepAvailability(state, input, ctx);
            case 'manageUsers': return stepManageUsers(state, input, ctx);
        }
    }
}
