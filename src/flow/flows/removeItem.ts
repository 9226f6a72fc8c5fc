import { itemScope, scopeCreatorId } from '../../core/permissions';
import { finish, FlowContext, FlowInput, moveTo, roleOf, storageFault, Transition } from '../context';
import { parseName } from '../fields';
import { nextActionButtons } from '../keyboards';
import { ASK_REMOVE_NAME, itemsRemoved, NOT_AUTHORIZED, retry } from '../messages';
import { prompt, text } from '../replies';
import { RemoveItemState } from '../state';

export const enterRemoveItem = async (): Promise<Transition> =>
    moveTo({ flow: 'removeItem', step: 'name' }, prompt(ASK_REMOVE_NAME));

/** Admins remove every item of that name in the chat, users only the ones they created. */
export const stepRemoveItem = async (
    state: RemoveItemState,
    input: FlowInput,
    ctx: FlowContext
): Promise<Transition> => {
    if (input.kind !== 'text') return moveTo(state, prompt(ASK_REMOVE_NAME));

    const name = parseName(input.text, ctx.settings);
    if (!name.ok) return moveTo(state, prompt(retry(name.error, ASK_REMOVE_NAME)));

    const scope = itemScope(await roleOf(ctx), ctx.conv.userId);
    if (!scope) return finish(text(NOT_AUTHORIZED));

    try {
        const count = await ctx.items.deleteByNameAndChat(name.value, ctx.conv.chatId, scopeCreatorId(scope));
        ctx.logger.info('Items removed', { chatId: ctx.conv.chatId, userId: ctx.conv.userId, count });
        return finish(text(itemsRemoved(name.value, count), nextActionButtons({ type: 'startRemove' }, 'Remove another')));
    } catch (error) {
        return finish(storageFault(ctx, 'Item delete', error));
    }
};
