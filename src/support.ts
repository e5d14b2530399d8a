import { randomUUID } from 'crypto';
import type { AuditLog } from './audit';
import { NotFoundError, ValidationError, persisting } from './errors';
import type { DocumentStore } from './repository';
import type { SupportTicket } from './types';

export class SupportDesk {
  constructor(
    private readonly store: DocumentStore,
    private readonly audit: AuditLog,
    private readonly now: () => Date = () => new Date(),
    private readonly newId: () => string = () => randomUUID().slice(0, 8),
  ) {}

  async open(customerId: string, description: string): Promise<SupportTicket> {
    const text = description.trim();
    if (text === '') {
      throw new ValidationError('Description cannot be empty');
    }
    const ticket: SupportTicket = {
      supportTicketId: this.newId(),
      customerId,
      description: text,
      status: 'OPEN',
      resolution: '',
      createdAt: this.now().toISOString(),
    };
    await persisting('submit support ticket', () => this.store.insertOne('supportTickets', ticket));
    await this.audit.record(customerId, 'SUPPORT', `Opened support ticket ${ticket.supportTicketId}`);
    return ticket;
  }

  /** Oldest first. */
  async listOpen(): Promise<SupportTicket[]> {
    const open = await persisting('list support tickets', () =>
      this.store.find('supportTickets', { status: 'OPEN' })
    );
    return open.sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  async resolve(supportTicketId: string, note: string, actor: string): Promise<void> {
    const resolved = await persisting('resolve support ticket', () =>
      this.store.updateOne('supportTickets', supportTicketId, {
        set: { status: 'RESOLVED', resolution: note.trim(), resolvedAt: this.now().toISOString() },
        where: { status: 'OPEN' },
      })
    );
    if (!resolved) {
      throw new NotFoundError('Open support ticket', supportTicketId);
    }
    await this.audit.record(actor, 'SUPPORT', `Resolved support ticket ${supportTicketId}`);
  }
}
