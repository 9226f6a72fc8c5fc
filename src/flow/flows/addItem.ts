import { withinWorkingHours } from '../../core/validators';
import { NewItem } from '../../db/types';
import { finish, FlowContext, FlowInput, moveTo, storageFault, Transition } from '../context';
import { parseAmount, parseName, parsePrice, parseType, parseYesNo } from '../fields';
import { itemAvailabilityButtons, itemTypeButtons, nextActionButtons } from '../keyboards';
import {
    ASK_AMOUNT,
    ASK_AVAILABILITY,
    ASK_NAME,
    ASK_PRICE,
    ASK_TYPE,
    itemAdded,
    OUTSIDE_WORKING_HOURS,
    retry
} from '../messages';
import { prompt, text } from '../replies';
import { AddItemState } from '../state';

export const enterAddItem = async (ctx: FlowContext): Promise<Transition> => {
    const { skipWorkingHours, workingHoursTimeZone } = ctx.settings;
    if (!withinWorkingHours(ctx.now(), skipWorkingHours, workingHoursTimeZone, ctx.logger)) {
        return finish(text(OUTSIDE_WORKING_HOURS));
    }
    return moveTo({ flow: 'addItem', step: 'name' }, prompt(ASK_NAME));
};

const askType = (ctx: FlowContext, problem?: string) =>
    text(problem ? retry(problem, ASK_TYPE) : ASK_TYPE, itemTypeButtons(ctx.settings.allowedTypes));

const askAvailability = (problem?: string) =>
    text(problem ? retry(problem, ASK_AVAILABILITY) : ASK_AVAILABILITY, itemAvailabilityButtons());

const commit = async (item: NewItem, ctx: FlowContext): Promise<Transition> => {
    try {
        const created = await ctx.items.create(item, ctx.conv.chatId, ctx.conv.userId);
        ctx.logger.info('Item created', { chatId: ctx.conv.chatId, userId: ctx.conv.userId, itemId: created.id });
        return finish(text(itemAdded(created, ctx.settings), nextActionButtons({ type: 'startAdd' }, 'Add another')));
    } catch (error) {
        return finish(storageFault(ctx, 'Item create', error));
    }
};

export const stepAddItem = async (state: AddItemState, input: FlowInput, ctx: FlowContext): Promise<Transition> => {
    switch (state.step) {
        case 'name': {
            if (input.kind !== 'text') return moveTo(state, prompt(ASK_NAME));
            const name = parseName(input.text, ctx.settings);
            if (!name.ok) return moveTo(state, prompt(retry(name.error, ASK_NAME)));
            return moveTo({ flow: 'addItem', step: 'amount', name: name.value }, prompt(ASK_AMOUNT));
        }
        case 'amount': {
            if (input.kind !== 'text') return moveTo(state, prompt(ASK_AMOUNT));
            const amount = parseAmount(input.text, ctx.settings);
            if (!amount.ok) return moveTo(state, prompt(retry(amount.error, ASK_AMOUNT)));
            return moveTo({ ...state, step: 'type', amount: amount.value }, askType(ctx));
        }
        case 'type': {
            let raw: string;
            if (input.kind === 'text') raw = input.text;
            else if (input.action.type === 'itemType') raw = input.action.value;
            else return moveTo(state, askType(ctx));

            const type = parseType(raw, ctx.settings);
            if (!type.ok) return moveTo(state, askType(ctx, type.error));
            return moveTo({ ...state, step: 'price', type: type.value }, prompt(ASK_PRICE));
        }
        case 'price': {
            if (input.kind !== 'text') return moveTo(state, prompt(ASK_PRICE));
            const price = parsePrice(input.text, ctx.settings);
            if (!price.ok) return moveTo(state, prompt(retry(price.error, ASK_PRICE)));
            return moveTo({ ...state, step: 'availability', price: price.value }, askAvailability());
        }
        case 'availability': {
            let available: boolean;
            if (input.kind === 'action') {
                if (input.action.type !== 'itemAvailability') return moveTo(state, askAvailability());
                available = input.action.available;
            } else {
                const answer = parseYesNo(input.text);
                if (!answer.ok) return moveTo(state, askAvailability(answer.error));
                available = answer.value;
            }
            const { name, amount, type, price } = state;
            return commit({ name, amount, type, price, available }, ctx);
        }
    }
};
