import { randomUUID } from 'crypto';
import { persisting } from './errors';
import { describeError, silentLogger, type Logger } from './logger';
import type { DocumentStore } from './repository';
import type { AuditCategory, AuditEntry } from './types';

export interface AuditOptions {
  now?: () => Date;
  newId?: () => string;
  log?: Logger;
}

/**
 * Persisted trail of who did what. A failed write is logged at error level
 * and does not undo the action being recorded.
 */
export class AuditLog {
  private readonly now: () => Date;
  private readonly newId: () => string;
  private readonly log: Logger;

  constructor(private readonly store: DocumentStore, options: AuditOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? randomUUID;
    this.log = options.log ?? silentLogger;
  }

  async record(actor: string, category: AuditCategory, action: string): Promise<void> {
    const entry: AuditEntry = {
      entryId: this.newId(),
      timestamp: this.now().toISOString(),
      category,
      actor,
      action,
    };
    try {
      await this.store.insertOne('auditLog', entry);
    } catch (err) {
      this.log({ level: 'error', action: 'audit.error', category, actor, error: describeError(err) });
    }
  }

  /** Newest first. */
  async list(): Promise<AuditEntry[]> {
    const entries = await persisting('load audit log', () => this.store.find('auditLog'));
    return entries.sort((a, b) =>
      b.timestamp.localeCompare(a.timestamp) || b.entryId.localeCompare(a.entryId)
    );
  }
}
