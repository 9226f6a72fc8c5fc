import { NavigationAction } from './actions';
import { Button } from './replies';

/** Labels of the persistent keyboard sent with /start; typing one is the same as pressing it. */
export const MAIN_KEYBOARD: string[][] = [
    ['Get', 'Add'],
    ['Update item', 'Remove item'],
    ['Admin', 'Send test message'],
    ['Change availability status', 'Export']
];

const MAIN_LABEL_ACTIONS = new Map<string, NavigationAction>([
    ['get', { type: 'listItems' }],
    ['add', { type: 'startAdd' }],
    ['update item', { type: 'startUpdate' }],
    ['remove item', { type: 'startRemove' }],
    ['admin', { type: 'adminPanel' }],
    ['send test message', { type: 'testMessage' }],
    ['change availability status', { type: 'startAvailability' }],
    ['export', { type: 'exportItems' }]
]);

export const mainLabelAction = (text: string): NavigationAction | undefined =>
    MAIN_LABEL_ACTIONS.get(text.trim().toLowerCase());

export const menuButtons = (): Button[][] => [
    [
        { label: 'Get', action: { type: 'listItems' } },
        { label: 'Add', action: { type: 'startAdd' } }
    ],
    [
        { label: 'Update item', action: { type: 'startUpdate' } },
        { label: 'Remove item', action: { type: 'startRemove' } }
    ],
    [
        { label: 'Admin', action: { type: 'adminPanel' } },
        { label: 'Change availability status', action: { type: 'startAvailability' } }
    ],
    [
        { label: 'Send test message', action: { type: 'testMessage' } },
        { label: 'Export', action: { type: 'exportItems' } }
    ],
    [{ label: 'Stop', action: { type: 'stop' } }]
];

/** "Do it again" plus a way back to the menu, offered after a flow completes. */
export const nextActionButtons = (again: NavigationAction, againLabel: string): Button[][] => [
    [
        { label: againLabel, action: again },
        { label: 'Menu', action: { type: 'menu' } }
    ]
];

export const itemTypeButtons = (types: string[]): Button[][] =>
    types.map((value): Button[] => [{ label: value, action: { type: 'itemType', value } }]);

export const updateTypeButtons = (types: string[]): Button[][] =>
    types.map((value): Button[] => [{ label: value, action: { type: 'updateType', value } }]);

export const itemAvailabilityButtons = (): Button[][] => [[
    { label: 'Yes', action: { type: 'itemAvailability', available: true } },
    { label: 'No', action: { type: 'itemAvailability', available: false } }
]];

export const availabilityStatusButtons = (): Button[][] => [[
    { label: 'Yes', action: { type: 'availabilityStatus', available: true } },
    { label: 'No', action: { type: 'availabilityStatus', available: false } }
]];

export const updateAvailabilityButtons = (): Button[][] => [[
    { label: 'Yes', action: { type: 'updateAvailability', available: true } },
    { label: 'No', action: { type: 'updateAvailability', available: false } }
]];

export const updateFieldButtons = (): Button[][] => [
    [
        { label: 'Name', action: { type: 'updateField', field: 'name' } },
        { label: 'Amount', action: { type: 'updateField', field: 'amount' } }
    ],
    [
        { label: 'Type', action: { type: 'updateField', field: 'type' } },
        { label: 'Price', action: { type: 'updateField', field: 'price' } }
    ],
    [{ label: 'Availability', action: { type: 'updateField', field: 'availability' } }],
    [{ label: 'Done', action: { type: 'updateField', field: 'done' } }]
];

export const adminPanelButtons = (): Button[][] => [
    [
        { label: 'List users', action: { type: 'manageUsers', op: 'list' } },
        { label: 'Add user', action: { type: 'manageUsers', op: 'add' } }
    ],
    [
        { label: 'Set role', action: { type: 'manageUsers', op: 'setRole' } },
        { label: 'Remove user', action: { type: 'manageUsers', op: 'remove' } }
    ],
    [{ label: 'Menu', action: { type: 'menu' } }]
];

export const addUserRoleButtons = (): Button[][] => [[
    { label: 'admin', action: { type: 'addUserRole', role: 'admin' } },
    { label: 'user', action: { type: 'addUserRole', role: 'user' } }
]];

export const setUserRoleButtons = (): Button[][] => [[
    { label: 'admin', action: { type: 'setUserRole', role: 'admin' } },
    { label: 'user', action: { type: 'setUserRole', role: 'user' } }
]];

export const afterAdminButtons = (): Button[][] => [[
    { label: 'Admin panel', action: { type: 'adminPanel' } },
    { label: 'Menu', action: { type: 'menu' } }
]];
