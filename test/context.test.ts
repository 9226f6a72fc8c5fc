import { matchCommand } from '../src/bot/context';

describe('matchCommand', () => {
    const BOT = 'inventory_test_bot';

    it('reads plain and addressed commands', () => {
        expect(matchCommand('/start', BOT)).toEqual({ addressed: true, name: 'start' });
        expect(matchCommand('/Menu please', BOT)).toEqual({ addressed: true, name: 'menu' });
        expect(matchCommand('/get@Inventory_Test_Bot', BOT)).toEqual({ addressed: true, name: 'get' });
    });

    it('marks commands for other bots as not addressed', () => {
        expect(matchCommand('/start@OtherBot', BOT)).toEqual({ addressed: false });
        expect(matchCommand('/stop@other_bot now', BOT)).toEqual({ addressed: false });
    });

    it('leaves plain text alone', () => {
        expect(matchCommand('Add', BOT)).toBeNull();
        expect(matchCommand('a /start in the middle', BOT)).toBeNull();
        expect(matchCommand('/', BOT)).toBeNull();
    });
});
