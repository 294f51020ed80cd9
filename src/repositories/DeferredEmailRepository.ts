import { Database } from 'sqlite';
import { DeferredEmailRow, EmailRecord } from '../types/models';
import { deferredRowToRecord, recordToDeferredRow } from '../models/transformers';

/**
 * Holds messages suppressed by Do-Not-Disturb until a later batch picks them
 * up again. Owned by the service layer; the triage core never touches it.
 */
export class DeferredEmailRepository {
  constructor(private readonly db: Database) {}

  async save(record: EmailRecord, priorityScore: number, deferredAt: Date = new Date()): Promise<void> {
    const row = recordToDeferredRow(record, priorityScore, deferredAt);
    await this.db.run(`
      INSERT OR REPLACE INTO deferred_emails (
        message_id, thread_id, sender, display_name, subject, body,
        received_at, labels, recipients, priority_score, deferred_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `, [
      row.message_id, row.thread_id, row.sender, row.display_name, row.subject, row.body,
      row.received_at, row.labels, row.recipients, row.priority_score, row.deferred_at
    ]);
  }

  async saveAll(entries: Array<{ record: EmailRecord; priorityScore: number }>, deferredAt: Date = new Date()): Promise<void> {
    for (const entry of entries) {
      await this.save(entry.record, entry.priorityScore, deferredAt);
    }
  }

  async list(): Promise<DeferredEmailRow[]> {
    return this.db.all<DeferredEmailRow[]>(
      'SELECT * FROM deferred_emails ORDER BY received_at ASC, message_id ASC'
    );
  }

  async count(): Promise<number> {
    const result = await this.db.get<{ count: number }>('SELECT COUNT(*) as count FROM deferred_emails');
    return result?.count ?? 0;
  }

  /**
   * Returns up to `limit` of the oldest deferred messages without removing
   * them; callers delete with `removeAll` once the batch has completed
   */
  async peekOldest(limit: number): Promise<EmailRecord[]> {
    if (limit <= 0) {
      return [];
    }

    const rows = await this.db.all<DeferredEmailRow[]>(
      'SELECT * FROM deferred_emails ORDER BY received_at ASC, message_id ASC LIMIT ?',
      [limit]
    );
    return rows.map(deferredRowToRecord);
  }

  async removeAll(messageIds: readonly string[]): Promise<number> {
    let removed = 0;
    for (const messageId of messageIds) {
      if (await this.remove(messageId)) removed++;
    }
    return removed;
  }

  async remove(messageId: string): Promise<boolean> {
    const result = await this.db.run('DELETE FROM deferred_emails WHERE message_id = ?', [messageId]);
    return (result.changes ?? 0) > 0;
  }
}
