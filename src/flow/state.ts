import { ItemPatch } from '../db/types';
import { FlowAction, UpdateField } from './actions';

export type AddItemState =
    | { flow: 'addItem'; step: 'name' }
    | { flow: 'addItem'; step: 'amount'; name: string }
    | { flow: 'addItem'; step: 'type'; name: string; amount: number }
    | { flow: 'addItem'; step: 'price'; name: string; amount: number; type: string }
    | { flow: 'addItem'; step: 'availability'; name: string; amount: number; type: string; price: number };

export interface UpdateTarget {
    itemId: number;
    itemName: string;
    patch: ItemPatch;
}

export type UpdateItemState =
    | { flow: 'updateItem'; step: 'name' }
    | ({ flow: 'updateItem'; step: 'field' } & UpdateTarget)
    | ({ flow: 'updateItem'; step: 'value'; field: UpdateField } & UpdateTarget);

export type RemoveItemState = { flow: 'removeItem'; step: 'name' };

export type AvailabilityState =
    | { flow: 'availability'; step: 'name' }
    | { flow: 'availability'; step: 'status'; itemName: string };

export type ManageUsersState =
    | { flow: 'manageUsers'; step: 'addId' }
    | { flow: 'manageUsers'; step: 'addRole'; telegramUserId: number }
    | { flow: 'manageUsers'; step: 'setRoleId' }
    | { flow: 'manageUsers'; step: 'setRoleChoice'; telegramUserId: number }
    | { flow: 'manageUsers'; step: 'removeId' };

/** Everything collected so far for the single flow a conversation may have open. */
export type ConversationState =
    | AddItemState
    | UpdateItemState
    | RemoveItemState
    | AvailabilityState
    | ManageUsersState;

export type FlowKind = ConversationState['flow'];

const addItemStateId = (state: AddItemState): string => {
    switch (state.step) {
        case 'name': return 'waiting_for_item_name';
        case 'amount': return 'waiting_for_item_amount';
        case 'type': return 'waiting_for_item_type';
        case 'price': return 'waiting_for_item_price';
        case 'availability': return 'waiting_for_availability';
    }
};

const updateItemStateId = (state: UpdateItemState): string => {
    switch (state.step) {
        case 'name': return 'waiting_for_update_item_name';
        case 'field': return 'waiting_for_update_field';
        case 'value': return `waiting_for_update_${state.field}`;
    }
};

const manageUsersStateId = (state: ManageUsersState): string => {
    switch (state.step) {
        case 'addId': return 'waiting_for_manage_add_user_id';
        case 'addRole': return 'waiting_for_manage_add_user_role';
        case 'setRoleId': return 'waiting_for_manage_set_role_id';
        case 'setRoleChoice': return 'waiting_for_manage_set_role_choice';
        case 'removeId': return 'waiting_for_manage_remove_user_id';
    }
};

/** Stable identifier of the step a conversation is waiting in, used for logs and stale-button checks. */
export const stateId = (state: ConversationState): string => {
    switch (state.flow) {
        case 'addItem': return addItemStateId(state);
        case 'updateItem': return updateItemStateId(state);
        case 'removeItem': return 'waiting_for_remove_item_name';
        case 'availability':
            return state.step === 'name' ? 'waiting_for_availability_item_name' : 'waiting_for_availability_status';
        case 'manageUsers': return manageUsersStateId(state);
    }
};

/** The step a flow button belongs to. */
export const expectedStateId = (action: FlowAction): string => {
    switch (action.type) {
        case 'itemType': return 'waiting_for_item_type';
        case 'itemAvailability': return 'waiting_for_availability';
        case 'availabilityStatus': return 'waiting_for_availability_status';
        case 'updateField': return 'waiting_for_update_field';
        case 'updateType': return 'waiting_for_update_type';
        case 'updateAvailability': return 'waiting_for_update_availability';
        case 'addUserRole': return 'waiting_for_manage_add_user_role';
        case 'setUserRole': return 'waiting_for_manage_set_role_choice';
    }
};
