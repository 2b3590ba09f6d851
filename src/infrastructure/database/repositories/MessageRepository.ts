import Database from 'better-sqlite3';
import type { IMessageRepository } from '../../../core/interfaces/IMessageRepository.js';
import type { Message } from '../../../core/entities/Message.js';
import { toDialog, type Dialog } from '../../../core/entities/Dialog.js';
import { PersistenceError, errorMessage } from '../../../core/errors.js';

type InsertParams = [id: string, dialogId: string, text: string, participantIndex: number, createdAt: string];

/**
 * SQLite implementation of the append-only message store
 */
export class MessageRepository implements IMessageRepository {
  constructor(
    private db: Database.Database,
    private now: () => Date = () => new Date()
  ) {}

  insert(id: string, dialogId: string, text: string, participantIndex: number): Message {
    // Plain INSERT: a reused id must fail, never overwrite
    const row = this.run(`insert message ${id}`, () =>
      this.db
        .prepare<InsertParams, Message>(`
          INSERT INTO messages (id, dialog_id, text, participant_index, created_at)
          VALUES (?, ?, ?, ?, ?)
          RETURNING seq, id, dialog_id, text, participant_index, created_at
        `)
        .get(id, dialogId, text, participantIndex, this.now().toISOString())
    );

    if (!row) {
      throw new PersistenceError(`Failed to insert message ${id}: no row returned`);
    }
    return row;
  }

  listByDialog(dialogId: string): Message[] {
    return this.run(`list messages of dialog ${dialogId}`, () =>
      this.db
        .prepare<[string], Message>(`
          SELECT seq, id, dialog_id, text, participant_index, created_at
          FROM messages
          WHERE dialog_id = ?
          ORDER BY seq
        `)
        .all(dialogId)
    );
  }

  getDialog(dialogId: string): Dialog | null {
    return toDialog(dialogId, this.listByDialog(dialogId));
  }

  countMessages(): number {
    return this.count('SELECT COUNT(*) AS count FROM messages');
  }

  countDialogs(): number {
    return this.count('SELECT COUNT(DISTINCT dialog_id) AS count FROM messages');
  }

  private count(sql: string): number {
    const row = this.run('count messages', () =>
      this.db.prepare<[], { count: number }>(sql).get()
    );
    return row?.count ?? 0;
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof Database.SqliteError && error.code === 'SQLITE_CONSTRAINT_UNIQUE') {
        throw new PersistenceError(`Failed to ${operation}: id already exists`, { cause: error });
      }
      throw new PersistenceError(`Failed to ${operation}: ${errorMessage(error)}`, { cause: error });
    }
  }
}
