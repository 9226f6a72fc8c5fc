import { NewItem } from '../src/db/types';
import { stateId } from '../src/flow/state';
import { ADMIN, ALICE, BOB, CHAT, conv, firstText, setupEnv, TestEnv } from './helpers';

const lamp: NewItem = { name: 'Lamp', amount: 1, type: 'miscellaneous', price: null, available: false };

describe('change availability flow', () => {
    let env: TestEnv;

    beforeEach(async () => {
        env = await setupEnv();
        await env.items.create(lamp, CHAT, ALICE);
        await env.items.create(lamp, CHAT, BOB);
    });

    afterEach(async () => {
        await env.db.close();
    });

    const availableBy = async () => {
        const items = await env.items.list({ chatId: CHAT });
        return items.map(i => [i.createdByUserId, i.available]);
    };

    it('updates only the caller\'s items by button', async () => {
        const { engine } = env;
        const alice = conv(ALICE);
        expect(firstText(await engine.start(alice, { flow: 'availability' }))).toBe('Please provide item name:');

        const question = await engine.handleText(alice, 'LAMP');
        expect(question).toEqual([{
            kind: 'text',
            text: 'Is "LAMP" available? (yes/no)',
            buttons: [[
                { label: 'Yes', action: { type: 'availabilityStatus', available: true } },
                { label: 'No', action: { type: 'availabilityStatus', available: false } }
            ]]
        }]);

        expect(firstText(await engine.handleAction(alice, { type: 'availabilityStatus', available: true })))
            .toBe('Availability of "LAMP" set to available (1 item(s)).');
        await expect(availableBy()).resolves.toEqual([[BOB, false], [ALICE, true]]);
        await expect(engine.getState(alice)).resolves.toBeUndefined();
    });

    it('updates every item of that name for admins by text', async () => {
        const { engine } = env;
        const admin = conv(ADMIN);
        await engine.start(admin, { flow: 'availability' });
        await engine.handleText(admin, 'Lamp');
        expect(firstText(await engine.handleText(admin, 'maybe')))
            .toBe('Incorrect value, must be yes/no.\nIs "Lamp" available? (yes/no)');

        const state = await engine.getState(admin);
        expect(state && stateId(state)).toBe('waiting_for_availability_status');

        expect(firstText(await engine.handleText(admin, 'Yes')))
            .toBe('Availability of "Lamp" set to available (2 item(s)).');
        await expect(availableBy()).resolves.toEqual([[BOB, true], [ALICE, true]]);
    });

    it('reports when no item matched', async () => {
        const { engine } = env;
        const alice = conv(ALICE);
        await engine.start(alice, { flow: 'availability' });
        await engine.handleText(alice, 'Sofa');
        expect(firstText(await engine.handleText(alice, 'no'))).toBe('No items named "Sofa" found.');
    });
});
