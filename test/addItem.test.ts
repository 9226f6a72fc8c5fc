import { FlowEngine } from '../src/flow/engine';
import { stateId } from '../src/flow/state';
import { ALICE, conv, firstText, setupEnv, TestEnv } from './helpers';

describe('add item flow', () => {
    let env: TestEnv;
    const c = conv(ALICE);

    beforeEach(async () => {
        env = await setupEnv();
    });

    afterEach(async () => {
        await env.db.close();
    });

    const currentStep = async (engine: FlowEngine = env.engine) => {
        const state = await engine.getState(c);
        return state ? stateId(state) : 'none';
    };

    it('collects every field and stores the item with its creator', async () => {
        const { engine } = env;
        expect(firstText(await engine.start(c, { flow: 'addItem' }))).toBe('Please provide name of item:');
        expect(firstText(await engine.handleText(c, 'Lamp'))).toBe('Please provide amount of items:');

        const typeReplies = await engine.handleText(c, '3');
        expect(firstText(typeReplies)).toBe('Please choose item type:');
        expect(typeReplies?.[0]).toMatchObject({
            buttons: [
                [{ label: 'spare part', action: { type: 'itemType', value: 'spare part' } }],
                [{ label: 'miscellaneous', action: { type: 'itemType', value: 'miscellaneous' } }]
            ]
        });

        expect(firstText(await engine.handleAction(c, { type: 'itemType', value: 'miscellaneous' })))
            .toBe('Please provide item price value:');
        expect(firstText(await engine.handleText(c, '9.99'))).toBe('Is the item available? (yes/no)');

        const done = await engine.handleAction(c, { type: 'itemAvailability', available: false });
        expect(done).toEqual([{
            kind: 'text',
            text: 'Item added:\nItem name: Lamp\nAmount of items: 3\nItem type: miscellaneous',
            buttons: [[
                { label: 'Add another', action: { type: 'startAdd' } },
                { label: 'Menu', action: { type: 'menu' } }
            ]]
        }]);
        await expect(currentStep()).resolves.toBe('none');

        const stored = await env.items.list({ chatId: c.chatId });
        expect(stored).toHaveLength(1);
        expect(stored[0]).toMatchObject({
            name: 'Lamp',
            amount: 3,
            type: 'miscellaneous',
            price: 9.99,
            available: false,
            createdByUserId: ALICE
        });
    });

    it('accepts typed answers and shows price for detailed types', async () => {
        const { engine } = env;
        await engine.start(c, { flow: 'addItem' });
        await engine.handleText(c, 'Widget');
        await engine.handleText(c, '2');
        await engine.handleText(c, 'Spare Part');
        await engine.handleText(c, '1.50');
        const done = await engine.handleText(c, 'YES');

        expect(firstText(done)).toBe(
            'Item added:\nItem name: Widget\nAmount of items: 2\nItem type: spare part\nItem price: 1.50\nAvailability: yes'
        );
        const [item] = await env.items.list({ chatId: c.chatId });
        expect(item).toMatchObject({ name: 'Widget', amount: 2, type: 'spare part', price: 1.5, available: true });
    });

    it('re-asks the same question after invalid input', async () => {
        const { engine } = env;
        await engine.start(c, { flow: 'addItem' });
        expect(firstText(await engine.handleText(c, 'Lämp'))).toBe(
            'Item name must be 1-255 characters of latin letters, digits, spaces or punctuation.\n' +
            'Please provide name of item:'
        );
        await expect(currentStep()).resolves.toBe('waiting_for_item_name');

        await engine.handleText(c, 'Lamp');
        expect(firstText(await engine.handleText(c, 'three')))
            .toBe('Amount must be a whole number.\nPlease provide amount of items:');
        expect(firstText(await engine.handleText(c, '0')))
            .toBe('Amount must be between 1 and 100000.\nPlease provide amount of items:');

        await engine.handleText(c, '3');
        expect(firstText(await engine.handleText(c, 'tools')))
            .toBe('Item type must be one of: spare part or miscellaneous.\nPlease choose item type:');
        await expect(currentStep()).resolves.toBe('waiting_for_item_type');

        await engine.handleText(c, 'miscellaneous');
        expect(firstText(await engine.handleText(c, '-5')))
            .toBe('Price must be between 0 and 1000000.\nPlease provide item price value:');

        await engine.handleText(c, '5');
        expect(firstText(await engine.handleText(c, 'maybe')))
            .toBe('Incorrect value, must be yes/no.\nIs the item available? (yes/no)');
        await expect(currentStep()).resolves.toBe('waiting_for_availability');
        await expect(env.items.list({})).resolves.toEqual([]);
    });

    it('refuses to start outside working hours', async () => {
        const engine = new FlowEngine({
            items: env.items,
            users: env.users,
            logger: env.logger,
            settings: { ...env.settings, skipWorkingHours: false },
            // Sunday noon in Lisbon
            now: () => new Date('2026-01-18T12:00:00Z')
        });
        expect(firstText(await engine.start(c, { flow: 'addItem' })))
            .toBe('You are trying to send request outside of working hours - please try again later.');
        await expect(currentStep(engine)).resolves.toBe('none');
    });

    it('starts during working hours', async () => {
        const engine = new FlowEngine({
            items: env.items,
            users: env.users,
            logger: env.logger,
            settings: { ...env.settings, skipWorkingHours: false },
            now: () => new Date('2026-01-14T10:00:00Z')
        });
        expect(firstText(await engine.start(c, { flow: 'addItem' }))).toBe('Please provide name of item:');
    });

    it('clears the flow when the item cannot be stored', async () => {
        const { engine } = env;
        jest.spyOn(env.items, 'create').mockRejectedValue(new Error('disk I/O error'));
        await engine.start(c, { flow: 'addItem' });
        await engine.handleText(c, 'Lamp');
        await engine.handleText(c, '3');
        await engine.handleText(c, 'miscellaneous');
        await engine.handleText(c, '9.99');

        expect(firstText(await engine.handleText(c, 'no')))
            .toBe('Failed to process the request. Please try again later.');
        await expect(currentStep()).resolves.toBe('none');
    });
});
