import { formatCents } from '../pricing';
import type { AuditEntry, Cart, CartItem, Merchandise, Order, Park, Ticket, User } from '../types';

export function describePark(park: Park): string {
  return `${park.name} (${park.parkId}), ${park.location}: ${formatCents(park.price)}, ${park.stock} left`;
}

export function describeMerchandise(item: Merchandise): string {
  return `${item.name} (${item.sku}): ${formatCents(item.price)}, ${item.stock} left`;
}

export function describeLine(item: CartItem): string {
  const label = item.kind === 'TICKET' ? `Ticket - ${item.name} on ${item.visitDate ?? '?'}` : item.name;
  return `${label} - Qty: ${item.quantity} @ ${formatCents(item.unitPrice)} = ${formatCents(item.unitPrice * item.quantity)}`;
}

export function cartLines(cart: Cart): string[] {
  return cart.items.map((item, index) => `${index + 1}. ${describeLine(item)}`);
}

export function describeTicket(ticket: Ticket): string {
  return `[${ticket.ticketId}] ${ticket.parkName} on ${ticket.visitDate} x${ticket.admits} (${ticket.status})`;
}

export function ticketDetails(ticket: Ticket): string[] {
  return [
    `Ticket ID : ${ticket.ticketId}`,
    `Park      : ${ticket.parkName}`,
    `Visit Date: ${ticket.visitDate}`,
    `Admits    : ${ticket.admits}`,
    `Paid      : ${formatCents(ticket.unitPrice * ticket.admits)}`,
    `Status    : ${ticket.status}`,
  ];
}

export function orderSummary(order: Order): string {
  return `Order ${order.orderId}: ${order.items.length} line(s), total ${formatCents(order.total)}`;
}

export function describeAuditEntry(entry: AuditEntry): string {
  return `[${entry.timestamp}] [${entry.category}] ${entry.actor}: ${entry.action}`;
}

export function profileLines(user: User): string[] {
  const optIn = user.marketingOptIn === undefined ? 'unset' : user.marketingOptIn ? 'yes' : 'no';
  return [
    `Age group   : ${user.ageGroup ?? 'unset'}`,
    `Gender      : ${user.gender ?? 'unset'}`,
    `Region      : ${user.region ?? 'unset'}`,
    `Visitor type: ${user.visitorType ?? 'unset'}`,
    `Marketing   : ${optIn}`,
  ];
}
