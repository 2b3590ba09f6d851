import type { Message } from '../entities/Message.js';
import type { Dialog } from '../entities/Dialog.js';

/**
 * Interface for the append-only message store
 */
export interface IMessageRepository {
  /**
   * Append one message. Throws PersistenceError on a duplicate id or store failure.
   */
  insert(id: string, dialogId: string, text: string, participantIndex: number): Message;

  /**
   * Messages of a dialog in insertion order; empty for an unknown dialog.
   */
  listByDialog(dialogId: string): Message[];

  getDialog(dialogId: string): Dialog | null;

  countMessages(): number;

  countDialogs(): number;
}
