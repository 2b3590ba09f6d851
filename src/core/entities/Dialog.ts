import type { Message } from './Message.js';

/**
 * Derived view over the message log. Never stored.
 */
export interface Dialog {
  dialog_id: string;
  messages: Message[];
  message_count: number;
  first_message_at: string;
  last_message_at: string;
}

export function toDialog(dialogId: string, messages: Message[]): Dialog | null {
  if (messages.length === 0) {
    return null;
  }

  return {
    dialog_id: dialogId,
    messages,
    message_count: messages.length,
    first_message_at: messages[0].created_at,
    last_message_at: messages[messages.length - 1].created_at,
  };
}
