import { FlowSettings } from '../config';
import { Item, User } from '../db/types';
import { UpdateField } from './actions';

export const WELCOME = "Hi! :)\nI'm organizer bot. I will help you to add your items.";
export const MENU = 'What you want to do?';
export const HELP = [
    'Commands:',
    '/start - show the main keyboard',
    '/menu - choose an action',
    '/get - list items in this chat',
    '/report - export items to Excel',
    '/cancel - abandon the current step',
    '/stop - stop the bot (authorized chats only)',
    '/help - this message'
].join('\n');
export const CANCELLED = 'Cancelled. Use /menu to choose an action.';
export const NOT_UNDERSTOOD = "I didn't understand. Use /menu or the buttons below to choose an action.";
export const UNKNOWN_ACTION = 'Unknown action. Use /menu to choose an action.';
export const EXPIRED = 'This action has expired. Please start over.';
export const STORAGE_FAULT = 'Failed to process the request. Please try again later.';
export const SAVE_FAULT = 'Failed to save changes. Please try again later or press Done again.';
export const NOT_AUTHORIZED = 'You are not authorized to manage this item.';
export const ADMIN_ONLY = 'This action is available to admins only.';
export const OUTSIDE_WORKING_HOURS =
    'You are trying to send request outside of working hours - please try again later.';

export const ASK_NAME = 'Please provide name of item:';
export const ASK_AMOUNT = 'Please provide amount of items:';
export const ASK_TYPE = 'Please choose item type:';
export const ASK_PRICE = 'Please provide item price value:';
export const ASK_AVAILABILITY = 'Is the item available? (yes/no)';

export const ASK_UPDATE_NAME = 'Please provide the exact name of the item to update:';
export const ASK_REMOVE_NAME = 'Please provide the exact name of the item to remove:';
export const ASK_AVAILABILITY_NAME = 'Please provide item name:';

export const ASK_UPDATE_VALUE: Record<UpdateField, string> = {
    name: 'Please provide new item name:',
    amount: 'Please provide new amount:',
    type: 'Please choose new item type:',
    price: 'Please provide new item price:',
    availability: 'Is the item available now? (yes/no)'
};

export const CHOOSE_FIELD = 'Please choose a field using the buttons below.';
export const NO_CHANGES = 'No changes to save. Choose a field or press Done.';

export const ADMIN_PANEL = 'Admin panel. Choose an action:';
export const ASK_ADD_USER_ID = 'Send the Telegram user ID to add:';
export const ASK_SET_ROLE_USER_ID = 'Send the Telegram user ID whose role to change:';
export const ASK_REMOVE_USER_ID = 'Send the Telegram user ID to remove:';
export const INVALID_USER_ID = 'Telegram user ID must be numeric.';
export const INVALID_ROLE = 'Role must be admin or user.';
export const NO_USERS = 'No users registered yet.';
export const NO_ITEMS = 'No items found in this chat.';
export const STOPPING = 'Stopping bot...';

export const invalidName = (settings: FlowSettings): string =>
    `Item name must be ${settings.minNameLength}-${settings.maxNameLength} characters ` +
    'of latin letters, digits, spaces or punctuation.';
export const NOT_A_WHOLE_NUMBER = 'Amount must be a whole number.';
export const amountOutOfRange = (settings: FlowSettings): string =>
    `Amount must be between 1 and ${settings.maxItemAmount}.`;
export const typeNotAllowed = (settings: FlowSettings): string =>
    `Item type must be one of: ${settings.allowedTypes.join(' or ')}.`;
export const NOT_A_NUMBER = 'Price must be a number.';
export const priceOutOfRange = (settings: FlowSettings): string =>
    `Price must be between 0 and ${settings.maxItemPrice}.`;
export const NOT_YES_NO = 'Incorrect value, must be yes/no.';

/** Validation failure followed by the question it answers. */
export const retry = (problem: string, question: string): string => `${problem}\n${question}`;

export const askItemAvailable = (name: string): string => `Is "${name}" available? (yes/no)`;
export const itemNotFound = (name: string): string => `No item named "${name}" found in this chat.`;
export const itemAmbiguous = (name: string): string =>
    `Several items are named "${name}". Remove the duplicates first, then try again.`;
export const chooseField = (name: string): string =>
    `Updating "${name}". Choose a field to change, then press Done.`;
export const fieldSaved = (field: UpdateField): string =>
    `New ${field} noted. Choose another field or press Done.`;
export const itemsRemoved = (name: string, count: number): string =>
    count > 0 ? `Removed ${count} item(s) named "${name}".` : `No items named "${name}" found.`;
export const availabilityChanged = (name: string, available: boolean, count: number): string =>
    count > 0
        ? `Availability of "${name}" set to ${available ? 'available' : 'not available'} (${count} item(s)).`
        : `No items named "${name}" found.`;

export const userExists = (id: number): string => `User ${id} already exists.`;
export const userNotFound = (id: number): string => `User ${id} not found.`;
export const chooseRole = (id: number): string => `Choose a role for user ${id}:`;
export const userAdded = (user: User): string => `User ${user.telegramUserId} added with role ${user.role}.`;
export const roleChanged = (user: User): string => `User ${user.telegramUserId} now has role ${user.role}.`;
export const userRemoved = (id: number): string => `User ${id} removed.`;
export const notAuthorizedToStop = (chatId: number): string => `Your ID (${chatId}) is not authorized to stop bot`;

const formatPrice = (price: number | null): string => (price === null ? '-' : price.toFixed(2));

export const formatItem = (item: Item, detailed: boolean): string => {
    const lines = [
        `Item name: ${item.name}`,
        `Amount of items: ${item.amount}`,
        `Item type: ${item.type}`
    ];
    if (detailed) {
        lines.push(`Item price: ${formatPrice(item.price)}`);
        lines.push(`Availability: ${item.available ? 'yes' : 'no'}`);
    }
    return lines.join('\n');
};

export const itemAdded = (item: Item, settings: FlowSettings): string =>
    `Item added:\n${formatItem(item, settings.detailedTypes.includes(item.type))}`;

export const itemUpdated = (item: Item): string => `Item updated:\n${formatItem(item, true)}`;

export const itemList = (items: Item[]): string =>
    'Items in this chat:\n' +
    items.map(i => `Item: ${i.name}, Amount: ${i.amount}${i.available ? '' : ' (not available)'}`).join('\n');

export const userList = (users: User[]): string =>
    'Users:\n' + users.map(u => `${u.telegramUserId} - ${u.role}`).join('\n');
