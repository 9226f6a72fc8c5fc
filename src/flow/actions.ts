import { isRoleName, RoleName } from '../db/types';

export type UpdateField = 'name' | 'amount' | 'type' | 'price' | 'availability';

export const UPDATE_FIELDS: readonly UpdateField[] = ['name', 'amount', 'type', 'price', 'availability'];

export type ManageUsersOp = 'list' | 'add' | 'setRole' | 'remove';

/** Buttons that open something regardless of the conversation's current step. */
export type NavigationAction =
    | { type: 'menu' }
    | { type: 'listItems' }
    | { type: 'startAdd' }
    | { type: 'startUpdate' }
    | { type: 'startRemove' }
    | { type: 'startAvailability' }
    | { type: 'adminPanel' }
    | { type: 'testMessage' }
    | { type: 'exportItems' }
    | { type: 'stop' }
    | { type: 'manageUsers'; op: ManageUsersOp };

/** Buttons that answer the question of one specific flow step. */
export type FlowAction =
    | { type: 'itemType'; value: string }
    | { type: 'itemAvailability'; available: boolean }
    | { type: 'availabilityStatus'; available: boolean }
    | { type: 'updateField'; field: UpdateField | 'done' }
    | { type: 'updateType'; value: string }
    | { type: 'updateAvailability'; available: boolean }
    | { type: 'addUserRole'; role: RoleName }
    | { type: 'setUserRole'; role: RoleName };

export type Action = NavigationAction | FlowAction;

const NAVIGATION_TOKENS = new Map<string, NavigationAction>([
    ['show_menu', { type: 'menu' }],
    ['Get', { type: 'listItems' }],
    ['Add', { type: 'startAdd' }],
    ['update_item', { type: 'startUpdate' }],
    ['remove_item', { type: 'startRemove' }],
    ['availability_status', { type: 'startAvailability' }],
    ['Admin', { type: 'adminPanel' }],
    ['Send test message', { type: 'testMessage' }],
    ['export_items', { type: 'exportItems' }],
    ['stop_bot', { type: 'stop' }],
    ['mu_list', { type: 'manageUsers', op: 'list' }],
    ['mu_add', { type: 'manageUsers', op: 'add' }],
    ['mu_set_role', { type: 'manageUsers', op: 'setRole' }],
    ['mu_remove', { type: 'manageUsers', op: 'remove' }]
]);

const MANAGE_USERS_TOKENS: Record<ManageUsersOp, string> = {
    list: 'mu_list',
    add: 'mu_add',
    setRole: 'mu_set_role',
    remove: 'mu_remove'
};

const yesNo = (available: boolean): string => (available ? 'yes' : 'no');

const parseYesNo = (value: string): boolean | null => {
    if (value === 'yes') return true;
    if (value === 'no') return false;
    return null;
};

const FLOW_ACTION_TYPES: readonly string[] = [
    'itemType',
    'itemAvailability',
    'availabilityStatus',
    'updateField',
    'updateType',
    'updateAvailability',
    'addUserRole',
    'setUserRole'
];

export const isFlowAction = (action: Action): action is FlowAction => FLOW_ACTION_TYPES.includes(action.type);

export const encodeAction = (action: Action): string => {
    switch (action.type) {
        case 'menu': return 'show_menu';
        case 'listItems': return 'Get';
        case 'startAdd': return 'Add';
        case 'startUpdate': return 'update_item';
        case 'startRemove': return 'remove_item';
        case 'startAvailability': return 'availability_status';
        case 'adminPanel': return 'Admin';
        case 'testMessage': return 'Send test message';
        case 'exportItems': return 'export_items';
        case 'stop': return 'stop_bot';
        case 'manageUsers': return MANAGE_USERS_TOKENS[action.op];
        case 'itemType': return `item_type_${action.value}`;
        case 'itemAvailability': return `item_availability_${yesNo(action.available)}`;
        case 'availabilityStatus': return `avail_status_${yesNo(action.available)}`;
        case 'updateField': return `update_field_${action.field}`;
        case 'updateType': return `update_type_${action.value}`;
        case 'updateAvailability': return `update_availability_${yesNo(action.available)}`;
        case 'addUserRole': return `mu_add_role_${action.role}`;
        case 'setUserRole': return `mu_set_role_${action.role}`;
    }
};

type PrefixParser = [prefix: string, parse: (rest: string) => FlowAction | null];

const PREFIX_PARSERS: PrefixParser[] = [
    ['item_type_', rest => (rest ? { type: 'itemType', value: rest } : null)],
    ['item_availability_', rest => {
        const available = parseYesNo(rest);
        return available === null ? null : { type: 'itemAvailability', available };
    }],
    ['avail_status_', rest => {
        const available = parseYesNo(rest);
        return available === null ? null : { type: 'availabilityStatus', available };
    }],
    ['update_field_', rest => {
        if (rest === 'done') return { type: 'updateField', field: 'done' };
        const field = UPDATE_FIELDS.find(f => f === rest);
        return field ? { type: 'updateField', field } : null;
    }],
    ['update_type_', rest => (rest ? { type: 'updateType', value: rest } : null)],
    ['update_availability_', rest => {
        const available = parseYesNo(rest);
        return available === null ? null : { type: 'updateAvailability', available };
    }],
    ['mu_add_role_', rest => (isRoleName(rest) ? { type: 'addUserRole', role: rest } : null)],
    ['mu_set_role_', rest => (isRoleName(rest) ? { type: 'setUserRole', role: rest } : null)]
];

/** Decodes button payloads once at the edge; unknown payloads yield null. */
export const parseAction = (data: string): Action | null => {
    const navigation = NAVIGATION_TOKENS.get(data);
    if (navigation) return navigation;

    for (const [prefix, parse] of PREFIX_PARSERS) {
        if (data.startsWith(prefix)) {
            return parse(data.slice(prefix.length));
        }
    }
    return null;
};
