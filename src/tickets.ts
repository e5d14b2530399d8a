import type { AuditLog } from './audit';
import { assertVisitDate } from './cart';
import { stockAdjustment } from './catalog';
import {
  InvalidStatusTransitionError,
  NotFoundError,
  NotReschedulableError,
  PersistenceError,
  RefundDeniedError,
  ValidationError,
  persisting,
} from './errors';
import { silentLogger, type Logger } from './logger';
import { formatCents } from './pricing';
import { ConditionFailedError, type DocumentStore } from './repository';
import type { Ticket, TicketStatus } from './types';

const HOUR_MS = 60 * 60 * 1000;

/** Refunds are open while the visit (00:00 UTC on its date) is more than `cutoffHours` away. */
export function isRefundable(visitDate: string, now: Date, cutoffHours: number): boolean {
  const visitStart = Date.parse(`${visitDate}T00:00:00.000Z`);
  if (Number.isNaN(visitStart)) return false;
  return visitStart - now.getTime() > cutoffHours * HOUR_MS;
}

export interface TicketServiceOptions {
  refundCutoffHours?: number;
  now?: () => Date;
  log?: Logger;
}

export class TicketService {
  private readonly refundCutoffHours: number;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(
    private readonly store: DocumentStore,
    private readonly audit: AuditLog,
    options: TicketServiceOptions = {},
  ) {
    this.refundCutoffHours = options.refundCutoffHours ?? 24;
    this.now = options.now ?? (() => new Date());
    this.log = options.log ?? silentLogger;
  }

  async listForCustomer(customerId: string, status?: TicketStatus): Promise<Ticket[]> {
    const tickets = await persisting('list tickets', () =>
      this.store.find('tickets', status === undefined ? { customerId } : { customerId, status })
    );
    return tickets.sort((a, b) =>
      a.visitDate.localeCompare(b.visitDate) || a.createdAt.localeCompare(b.createdAt)
    );
  }

  async get(ticketId: string): Promise<Ticket | null> {
    return persisting('load ticket', () => this.store.get('tickets', ticketId));
  }

  async refund(ticketId: string, customerId: string): Promise<Ticket> {
    const ticket = await this.owned(ticketId, customerId);
    if (ticket.status !== 'ISSUED') {
      throw new InvalidStatusTransitionError(ticketId, ticket.status, 'REFUNDED');
    }
    if (!isRefundable(ticket.visitDate, this.now(), this.refundCutoffHours)) {
      this.log({ level: 'info', action: 'ticket.refund_denied', customerId, ticketId });
      throw new RefundDeniedError(this.refundCutoffHours);
    }

    const refunded = await this.release(ticket, 'REFUNDED');
    await this.audit.record(customerId, 'BOOKING', `Refunded ticket ${ticketId} (${formatCents(ticket.admits * ticket.unitPrice)})`);
    this.log({ level: 'info', action: 'ticket.refund', customerId, ticketId, amount: ticket.admits * ticket.unitPrice });
    return refunded;
  }

  /** Cancels without refund; the places go back on sale. */
  async cancel(ticketId: string, customerId: string): Promise<Ticket> {
    const ticket = await this.owned(ticketId, customerId);
    if (ticket.status !== 'ISSUED') {
      throw new InvalidStatusTransitionError(ticketId, ticket.status, 'CANCELLED');
    }
    const cancelled = await this.release(ticket, 'CANCELLED');
    await this.audit.record(customerId, 'BOOKING', `Cancelled ticket ${ticketId} without refund`);
    this.log({ level: 'info', action: 'ticket.cancel', customerId, ticketId });
    return cancelled;
  }

  /**
   * Moves an issued ticket to another visit date after today. Stock is held
   * per park, so no places move.
   */
  async reschedule(ticketId: string, customerId: string, visitDate: string): Promise<Ticket> {
    const ticket = await this.owned(ticketId, customerId);
    if (ticket.status !== 'ISSUED') {
      throw new NotReschedulableError(ticketId, ticket.status);
    }
    const date = assertVisitDate(visitDate, this.now());
    if (date === ticket.visitDate) {
      throw new ValidationError(`Ticket ${ticketId} is already for ${date}`);
    }

    const updatedAt = this.now().toISOString();
    const updated = await persisting('reschedule ticket', () =>
      this.store.updateOne('tickets', ticketId, { set: { visitDate: date, updatedAt }, where: { status: 'ISSUED' } })
    );
    if (!updated) {
      throw new NotReschedulableError(ticketId, 'no longer ISSUED');
    }
    await this.audit.record(customerId, 'BOOKING', `Rescheduled ticket ${ticketId} from ${ticket.visitDate} to ${date}`);
    this.log({ level: 'info', action: 'ticket.reschedule', customerId, ticketId, visitDate: date });
    return { ...ticket, visitDate: date, updatedAt };
  }

  /** Gate validation by an admin. */
  async markUsed(ticketId: string, actor: string): Promise<Ticket> {
    const ticket = await this.get(ticketId);
    if (!ticket) throw new NotFoundError('Ticket', ticketId);
    if (ticket.status !== 'ISSUED') {
      throw new InvalidStatusTransitionError(ticketId, ticket.status, 'USED');
    }

    const updatedAt = this.now().toISOString();
    const updated = await persisting('update ticket', () =>
      this.store.updateOne('tickets', ticketId, { set: { status: 'USED', updatedAt }, where: { status: 'ISSUED' } })
    );
    if (!updated) {
      throw new InvalidStatusTransitionError(ticketId, 'no longer ISSUED', 'USED');
    }
    await this.audit.record(actor, 'BOOKING', `Validated ticket ${ticketId}`);
    return { ...ticket, status: 'USED', updatedAt };
  }

  private async owned(ticketId: string, customerId: string): Promise<Ticket> {
    const ticket = await this.get(ticketId);
    if (!ticket || ticket.customerId !== customerId) {
      throw new NotFoundError('Ticket', ticketId);
    }
    return ticket;
  }

  /** Moves an ISSUED ticket to `status` and returns its places to the park's stock. */
  private async release(ticket: Ticket, status: 'REFUNDED' | 'CANCELLED'): Promise<Ticket> {
    const updatedAt = this.now().toISOString();
    try {
      await this.store.transact([
        {
          kind: 'update',
          collection: 'tickets',
          key: ticket.ticketId,
          update: { set: { status, updatedAt }, where: { status: 'ISSUED' } },
        },
        stockAdjustment({ kind: 'TICKET', referenceId: ticket.parkId }, ticket.admits),
      ]);
    } catch (err) {
      if (err instanceof ConditionFailedError && err.operationIndex === 0) {
        throw new InvalidStatusTransitionError(ticket.ticketId, 'no longer ISSUED', status);
      }
      // The park was deleted; nothing to return the places to.
      if (err instanceof ConditionFailedError && err.operationIndex === 1) {
        return this.releaseWithoutStock(ticket, status, updatedAt);
      }
      throw new PersistenceError(`Could not update ticket ${ticket.ticketId}`, err);
    }
    return { ...ticket, status, updatedAt };
  }

  private async releaseWithoutStock(
    ticket: Ticket,
    status: 'REFUNDED' | 'CANCELLED',
    updatedAt: string,
  ): Promise<Ticket> {
    const updated = await persisting('release ticket', () =>
      this.store.updateOne('tickets', ticket.ticketId, { set: { status, updatedAt }, where: { status: 'ISSUED' } })
    );
    if (!updated) {
      throw new InvalidStatusTransitionError(ticket.ticketId, 'no longer ISSUED', status);
    }
    this.log({ level: 'warn', action: 'ticket.release_without_stock', ticketId: ticket.ticketId, parkId: ticket.parkId });
    return { ...ticket, status, updatedAt };
  }
}
