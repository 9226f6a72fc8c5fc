import { StorageAdapter } from 'grammy';
import { Item } from '../src/db/types';
import { FlowEngine } from '../src/flow/engine';
import { ConversationState, stateId } from '../src/flow/state';
import { ALICE, BOB, conv, firstText, setupEnv, TestEnv } from './helpers';

const deferred = <T>() => {
    let resolve: (value: T) => void = () => undefined;
    const promise = new Promise<T>(r => {
        resolve = r;
    });
    return { promise, resolve };
};

describe('FlowEngine', () => {
    let env: TestEnv;
    const alice = conv(ALICE);

    beforeEach(async () => {
        env = await setupEnv();
    });

    afterEach(async () => {
        await env.db.close();
    });

    const currentStep = async (c = alice) => {
        const state = await env.engine.getState(c);
        return state ? stateId(state) : 'none';
    };

    it('leaves text alone when no flow is active', async () => {
        await expect(env.engine.handleText(alice, 'Lamp')).resolves.toBeNull();
    });

    it('cancels from any step and repeats the same neutral reply', async () => {
        const { engine } = env;
        await engine.start(alice, { flow: 'addItem' });
        await engine.handleText(alice, 'Lamp');

        expect(firstText(await engine.cancel(alice))).toBe('Cancelled. Use /menu to choose an action.');
        await expect(currentStep()).resolves.toBe('none');
        expect(firstText(await engine.cancel(alice))).toBe('Cancelled. Use /menu to choose an action.');
        expect(firstText(await engine.cancel(alice))).toBe('Cancelled. Use /menu to choose an action.');
        await expect(currentStep()).resolves.toBe('none');
    });

    it('drops scratch data when another flow starts', async () => {
        const { engine } = env;
        await engine.start(alice, { flow: 'addItem' });
        await engine.handleText(alice, 'Lamp');
        await engine.start(alice, { flow: 'removeItem' });
        await expect(engine.getState(alice)).resolves.toEqual({ flow: 'removeItem', step: 'name' });
    });

    it('answers a stale button with the expired message and no change', async () => {
        const { engine } = env;
        await engine.start(alice, { flow: 'addItem' });
        const before = await engine.getState(alice);

        expect(firstText(await engine.handleAction(alice, { type: 'itemType', value: 'miscellaneous' })))
            .toBe('This action has expired. Please start over.');
        await expect(engine.getState(alice)).resolves.toEqual(before);

        await engine.cancel(alice);
        expect(firstText(await engine.handleAction(alice, { type: 'itemAvailability', available: true })))
            .toBe('This action has expired. Please start over.');
        await expect(currentStep()).resolves.toBe('none');
    });

    it('keeps conversations of different users apart', async () => {
        const { engine } = env;
        const bob = conv(BOB);
        await engine.start(alice, { flow: 'addItem' });
        await engine.start(bob, { flow: 'removeItem' });
        await engine.handleText(alice, 'Lamp');

        await expect(currentStep(alice)).resolves.toBe('waiting_for_item_amount');
        await expect(currentStep(bob)).resolves.toBe('waiting_for_remove_item_name');
        await expect(currentStep(conv(ALICE, 999))).resolves.toBe('none');
    });

    it('does not write the state of a transition superseded by cancel', async () => {
        const { engine } = env;
        const item = await env.items.create(
            { name: 'Lamp', amount: 1, type: 'miscellaneous', price: null, available: true },
            alice.chatId,
            ALICE
        );
        const gate = deferred<Item[]>();
        jest.spyOn(env.items, 'list').mockImplementationOnce(() => gate.promise);

        await engine.start(alice, { flow: 'updateItem' });
        const pending = engine.handleText(alice, 'Lamp');
        expect(engine.pending).toBe(1);
        await engine.cancel(alice);
        gate.resolve([item]);

        expect(firstText(await pending)).toBe('Updating "Lamp". Choose a field to change, then press Done.');
        await expect(currentStep()).resolves.toBe('none');
        expect(engine.pending).toBe(0);
    });

    it('forgets conversations once their transitions settle', async () => {
        const { engine } = env;
        const bob = conv(BOB);
        await engine.start(alice, { flow: 'removeItem' });
        await engine.handleText(bob, 'Lamp');
        await engine.handleAction(bob, { type: 'itemAvailability', available: true });
        await engine.cancel(alice);
        await engine.cancel(bob);
        expect(engine.pending).toBe(0);

        await engine.start(alice, { flow: 'availability' });
        await expect(currentStep()).resolves.toBe('waiting_for_availability_item_name');
    });

    it('keeps state in the storage adapter it is given', async () => {
        const saved = new Map<string, ConversationState>();
        const storage: StorageAdapter<ConversationState> = {
            read: key => saved.get(key),
            write: (key, value) => {
                saved.set(key, value);
            },
            delete: key => {
                saved.delete(key);
            }
        };
        const engine = new FlowEngine({ items: env.items, users: env.users, settings: env.settings, logger: env.logger, storage });

        await engine.start(alice, { flow: 'availability' });
        expect(saved.get(`${alice.chatId}:${ALICE}`)).toEqual({ flow: 'availability', step: 'name' });
        await engine.cancel(alice);
        expect(saved.size).toBe(0);
    });
});
