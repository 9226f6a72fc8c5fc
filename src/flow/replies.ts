import { Action } from './actions';

export interface Button {
    label: string;
    action: Action;
}

export interface TextReply {
    kind: 'text';
    text: string;
    /** Inline buttons, row by row. */
    buttons?: Button[][];
    /** Persistent reply keyboard labels, row by row. */
    keyboard?: string[][];
    /** Asks the client to open a reply box for this message. */
    forceReply?: boolean;
}

export interface DocumentReply {
    kind: 'document';
    filePath: string;
    caption?: string;
    /** Remove the file once it has been sent. */
    temporary: boolean;
}

export type Reply = TextReply | DocumentReply;

export const text = (body: string, buttons?: Button[][]): TextReply =>
    buttons ? { kind: 'text', text: body, buttons } : { kind: 'text', text: body };

export const prompt = (body: string): TextReply => ({ kind: 'text', text: body, forceReply: true });
