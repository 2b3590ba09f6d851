import type { IMessageRepository } from '../../core/interfaces/IMessageRepository.js';
import type { ContextEntry, ContextRole } from '../../core/entities/Context.js';
import { BOT_PARTICIPANT, HUMAN_PARTICIPANT, type Message } from '../../core/entities/Message.js';
import { NotFoundError } from '../../core/errors.js';

/**
 * Map a participant index to a chat role. Unknown indices pass through as opaque roles.
 */
export function toRole(participantIndex: number): ContextRole {
  if (participantIndex === HUMAN_PARTICIPANT) return 'user';
  if (participantIndex === BOT_PARTICIPANT) return 'assistant';
  return String(participantIndex);
}

/**
 * Turns a dialog's stored history into context for an inference collaborator
 */
export class ContextAssembler {
  constructor(private messageRepo: IMessageRepository) {}

  /**
   * Full ordered history as role/content entries, for reply generation
   */
  buildContext(dialogId: string): ContextEntry[] {
    return this.loadHistory(dialogId).map((msg) => ({
      role: toRole(msg.participant_index),
      content: msg.text,
    }));
  }

  /**
   * The whole dialog as one text unit, for classification
   */
  buildClassificationText(dialogId: string): string {
    return this.loadHistory(dialogId)
      .map((msg) => msg.text)
      .join('\n');
  }

  private loadHistory(dialogId: string): Message[] {
    const messages = this.messageRepo.listByDialog(dialogId);
    if (messages.length === 0) {
      throw new NotFoundError(`No messages found for dialog ${dialogId}`);
    }
    return messages;
  }
}
