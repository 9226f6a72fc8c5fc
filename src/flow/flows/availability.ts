import { itemScope, scopeCreatorId } from '../../core/permissions';
import { finish, FlowContext, FlowInput, moveTo, roleOf, storageFault, Transition } from '../context';
import { parseName, parseYesNo } from '../fields';
import { availabilityStatusButtons, nextActionButtons } from '../keyboards';
import { ASK_AVAILABILITY_NAME, askItemAvailable, availabilityChanged, NOT_AUTHORIZED, retry } from '../messages';
import { prompt, Reply, text } from '../replies';
import { AvailabilityState } from '../state';

export const enterAvailability = async (): Promise<Transition> =>
    moveTo({ flow: 'availability', step: 'name' }, prompt(ASK_AVAILABILITY_NAME));

const askStatus = (itemName: string, problem?: string): Reply => {
    const question = askItemAvailable(itemName);
    return text(problem ? retry(problem, question) : question, availabilityStatusButtons());
};

const apply = async (itemName: string, available: boolean, ctx: FlowContext): Promise<Transition> => {
    const scope = itemScope(await roleOf(ctx), ctx.conv.userId);
    if (!scope) return finish(text(NOT_AUTHORIZED));

    try {
        const count = await ctx.items.updateAvailability(itemName, available, ctx.conv.chatId, scopeCreatorId(scope));
        ctx.logger.info('Availability changed', { chatId: ctx.conv.chatId, userId: ctx.conv.userId, count });
        return finish(
            text(
                availabilityChanged(itemName, available, count),
                nextActionButtons({ type: 'startAvailability' }, 'Change another')
            )
        );
    } catch (error) {
        return finish(storageFault(ctx, 'Availability update', error));
    }
};

export const stepAvailability = async (
    state: AvailabilityState,
    input: FlowInput,
    ctx: FlowContext
): Promise<Transition> => {
    if (state.step === 'name') {
        if (input.kind !== 'text') return moveTo(state, prompt(ASK_AVAILABILITY_NAME));
        const name = parseName(input.text, ctx.settings);
        if (!name.ok) return moveTo(state, prompt(retry(name.error, ASK_AVAILABILITY_NAME)));
        return moveTo({ flow: 'availability', step: 'status', itemName: name.value }, askStatus(name.value));
    }

    if (input.kind === 'action') {
        if (input.action.type !== 'availabilityStatus') return moveTo(state, askStatus(state.itemName));
        return apply(state.itemName, input.action.available, ctx);
    }
    const answer = parseYesNo(input.text);
    if (!answer.ok) return moveTo(state, askStatus(state.itemName, answer.error));
    return apply(state.itemName, answer.value, ctx);
};
