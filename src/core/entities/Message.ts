/**
 * Message domain entity
 *
 * Rows of the append-only `messages` log. `seq` is assigned by the store and is
 * the authoritative conversation order; `created_at` is informational.
 */
export const HUMAN_PARTICIPANT = 0;
export const BOT_PARTICIPANT = 1;

export interface Message {
  seq: number;
  id: string;
  dialog_id: string;
  text: string;
  participant_index: number;
  created_at: string;
}
