import { canManageItem } from '../../core/permissions';
import { Item, ItemPatch } from '../../db/types';
import { UpdateField } from '../actions';
import { finish, FlowContext, FlowInput, moveTo, roleOf, storageFault, Transition } from '../context';
import { FieldResult, parseAmount, parseName, parsePrice, parseType, parseYesNo } from '../fields';
import { nextActionButtons, updateAvailabilityButtons, updateFieldButtons, updateTypeButtons } from '../keyboards';
import {
    ASK_UPDATE_NAME,
    ASK_UPDATE_VALUE,
    CHOOSE_FIELD,
    chooseField,
    fieldSaved,
    itemAmbiguous,
    itemNotFound,
    itemUpdated,
    NO_CHANGES,
    NOT_AUTHORIZED,
    retry,
    SAVE_FAULT
} from '../messages';
import { prompt, Reply, text } from '../replies';
import { UpdateItemState, UpdateTarget } from '../state';

type FieldState = Extract<UpdateItemState, { step: 'field' }>;
type ValueState = Extract<UpdateItemState, { step: 'value' }>;

export const enterUpdateItem = async (): Promise<Transition> =>
    moveTo({ flow: 'updateItem', step: 'name' }, prompt(ASK_UPDATE_NAME));

const fieldMenu = (body: string): Reply => text(body, updateFieldButtons());

const askValue = (field: UpdateField, ctx: FlowContext, problem?: string): Reply => {
    const question = problem ? retry(problem, ASK_UPDATE_VALUE[field]) : ASK_UPDATE_VALUE[field];
    switch (field) {
        case 'type': return text(question, updateTypeButtons(ctx.settings.allowedTypes));
        case 'availability': return text(question, updateAvailabilityButtons());
        default: return prompt(question);
    }
};

const canManage = async (item: Item, ctx: FlowContext): Promise<boolean> =>
    canManageItem(item.createdByUserId, ctx.conv.userId, await roleOf(ctx));

const findItem = async (input: string, ctx: FlowContext): Promise<Transition> => {
    const name = input.trim();
    let matches: Item[];
    try {
        matches = await ctx.items.list({ chatId: ctx.conv.chatId, name }, 2);
    } catch (error) {
        return finish(storageFault(ctx, 'Item lookup', error));
    }

    if (matches.length === 0) return finish(text(itemNotFound(name)));
    if (matches.length > 1) return finish(text(itemAmbiguous(name)));

    const [item] = matches;
    if (!(await canManage(item, ctx))) return finish(text(NOT_AUTHORIZED));

    return moveTo(
        { flow: 'updateItem', step: 'field', itemId: item.id, itemName: item.name, patch: {} },
        fieldMenu(chooseField(item.name))
    );
};

const target = (state: UpdateTarget): UpdateTarget => ({
    itemId: state.itemId,
    itemName: state.itemName,
    patch: state.patch
});

const save = async (state: FieldState, ctx: FlowContext): Promise<Transition> => {
    if (Object.keys(state.patch).length === 0) return moveTo(state, fieldMenu(NO_CHANGES));

    try {
        const current = await ctx.items.getById(state.itemId);
        if (!current) return finish(text(itemNotFound(state.itemName)));
        if (!(await canManage(current, ctx))) return finish(text(NOT_AUTHORIZED));

        const updated = await ctx.items.updateById(state.itemId, state.patch);
        if (!updated) return finish(text(itemNotFound(state.itemName)));

        ctx.logger.info('Item updated', { chatId: ctx.conv.chatId, userId: ctx.conv.userId, itemId: updated.id });
        return finish(text(itemUpdated(updated), nextActionButtons({ type: 'startUpdate' }, 'Update another')));
    } catch (error) {
        storageFault(ctx, 'Item update', error);
        return moveTo(state, fieldMenu(SAVE_FAULT));
    }
};

const chooseFieldStep = async (state: FieldState, input: FlowInput, ctx: FlowContext): Promise<Transition> => {
    if (input.kind !== 'action' || input.action.type !== 'updateField') {
        return moveTo(state, fieldMenu(CHOOSE_FIELD));
    }
    const { field } = input.action;
    if (field === 'done') return save(state, ctx);
    return moveTo({ flow: 'updateItem', step: 'value', field, ...target(state) }, askValue(field, ctx));
};

const parseValue = (state: ValueState, input: FlowInput, ctx: FlowContext): FieldResult<ItemPatch> | null => {
    const wrap = <T>(result: FieldResult<T>, patch: (value: T) => ItemPatch): FieldResult<ItemPatch> =>
        result.ok ? { ok: true, value: patch(result.value) } : result;

    if (input.kind === 'action') {
        const { action } = input;
        if (state.field === 'type' && action.type === 'updateType') {
            return wrap(parseType(action.value, ctx.settings), type => ({ type }));
        }
        if (state.field === 'availability' && action.type === 'updateAvailability') {
            return { ok: true, value: { available: action.available } };
        }
        return null;
    }

    switch (state.field) {
        case 'name': return wrap(parseName(input.text, ctx.settings), name => ({ name }));
        case 'amount': return wrap(parseAmount(input.text, ctx.settings), amount => ({ amount }));
        case 'type': return wrap(parseType(input.text, ctx.settings), type => ({ type }));
        case 'price': return wrap(parsePrice(input.text, ctx.settings), price => ({ price }));
        case 'availability': return wrap(parseYesNo(input.text), available => ({ available }));
    }
};

const valueStep = (state: ValueState, input: FlowInput, ctx: FlowContext): Transition => {
    const result = parseValue(state, input, ctx);
    if (result === null) return moveTo(state, askValue(state.field, ctx));
    if (!result.ok) return moveTo(state, askValue(state.field, ctx, result.error));

    const patch: ItemPatch = { ...state.patch, ...result.value };
    return moveTo(
        { flow: 'updateItem', step: 'field', itemId: state.itemId, itemName: state.itemName, patch },
        fieldMenu(fieldSaved(state.field))
    );
};

export const stepUpdateItem = async (
    state: UpdateItemState,
    input: FlowInput,
    ctx: FlowContext
): Promise<Transition> => {
    switch (state.step) {
        case 'name':
            if (input.kind !== 'text') return moveTo(state, prompt(ASK_UPDATE_NAME));
            return findItem(input.text, ctx);
        case 'field':
            return chooseFieldStep(state, input, ctx);
        case 'value':
            return valueStep(state, input, ctx);
    }
};
