import { AGE_GROUPS, GENDERS, VISITOR_TYPES } from '../accounts';
import { cartTotal } from '../cart';
import { ValidationError } from '../errors';
import { formatCents } from '../pricing';
import type { Services } from '../services';
import type { Cart, CatalogRef, Profile, Ticket, User } from '../types';
import {
  cartLines,
  describeMerchandise,
  describePark,
  describeTicket,
  orderSummary,
  profileLines,
  ticketDetails,
} from './format';
import { askInteger, choose, confirm, runMenu, type MenuOption } from './menu';
import type { Terminal } from './terminal';

export enum CustomerCommand {
  BrowseParks = '1',
  AddTicket = '2',
  AddMerchandise = '3',
  ViewCart = '4',
  Checkout = '5',
  ViewTickets = '6',
  ContactSupport = '7',
  EditProfile = '8',
  Logout = '0',
}

const CUSTOMER_OPTIONS: MenuOption<CustomerCommand>[] = [
  { command: CustomerCommand.BrowseParks, label: 'Browse Parks' },
  { command: CustomerCommand.AddTicket, label: 'Add Ticket to Cart' },
  { command: CustomerCommand.AddMerchandise, label: 'Add Merchandise to Cart' },
  { command: CustomerCommand.ViewCart, label: 'View Cart' },
  { command: CustomerCommand.Checkout, label: 'Checkout' },
  { command: CustomerCommand.ViewTickets, label: 'View My Tickets' },
  { command: CustomerCommand.ContactSupport, label: 'Contact Support' },
  { command: CustomerCommand.EditProfile, label: 'Edit Profile' },
  { command: CustomerCommand.Logout, label: 'Logout' },
];

export enum TicketAction {
  Refund = '1',
  Cancel = '2',
  Reschedule = '3',
  Back = '0',
}

async function askQuantity(terminal: Terminal): Promise<number> {
  const quantity = await askInteger(terminal, 'Quantity: ');
  if (quantity === null) throw new ValidationError('Quantity must be a whole number');
  return quantity;
}

/** Enter keeps the current value (undefined); anything else must name one of `values`. */
async function askChoice<T extends string>(
  terminal: Terminal,
  label: string,
  values: readonly T[],
  current: T | undefined,
): Promise<T | undefined> {
  const answer = (await terminal.ask(`${label} (${values.join('/')}, Enter to keep ${current ?? 'unset'}): `)).trim();
  if (answer === '') return undefined;
  const match = values.find(value => value.toLowerCase() === answer.toLowerCase());
  if (match === undefined) throw new ValidationError(`${label} must be one of ${values.join(', ')}`);
  return match;
}

async function askProfile(terminal: Terminal, account: User): Promise<Profile> {
  const ageGroup = await askChoice(terminal, 'Age group', AGE_GROUPS, account.ageGroup);
  const gender = await askChoice(terminal, 'Gender', GENDERS, account.gender);
  const region = (await terminal.ask(`Region (Enter to keep ${account.region ?? 'unset'}): `)).trim();
  const visitorType = await askChoice(terminal, 'Visitor type', VISITOR_TYPES, account.visitorType);
  const optIn = (await terminal.ask('Marketing emails? (y/n, Enter to keep): ')).trim().toLowerCase();
  if (optIn !== '' && optIn !== 'y' && optIn !== 'n') {
    throw new ValidationError('Answer y or n');
  }
  return {
    ageGroup,
    gender,
    region: region === '' ? undefined : region,
    visitorType,
    marketingOptIn: optIn === '' ? undefined : optIn === 'y',
  };
}

export async function runCustomerConsole(services: Services, terminal: Terminal, user: User): Promise<void> {
  const { accounts, carts, catalog, checkout, support, tickets, renderCode } = services;
  let cart: Cart = await carts.load(user.userId);
  let account: User = user;

  const printCodes = (issued: Ticket[]): void => {
    for (const ticket of issued) {
      terminal.print(describeTicket(ticket));
      renderCode(ticket.ticketId, text => terminal.print(text));
    }
  };

  const addToCart = async (ref: CatalogRef, quantity: number, visitDate?: string): Promise<void> => {
    const updated = await checkout.addItem(cart, ref, quantity, visitDate);
    await carts.save(updated);
    cart = updated;
    terminal.print(`Added to cart. Cart total: ${formatCents(cartTotal(cart))}`);
  };

  const viewTicket = async (ticket: Ticket): Promise<void> => {
    terminal.print();
    ticketDetails(ticket).forEach(line => terminal.print(line));
    renderCode(ticket.ticketId, text => terminal.print(text));
    if (ticket.status !== 'ISSUED') return;

    terminal.print(`${TicketAction.Refund}. Request refund`);
    terminal.print(`${TicketAction.Cancel}. Cancel without refund`);
    terminal.print(`${TicketAction.Reschedule}. Change visit date`);
    terminal.print(`${TicketAction.Back}. Back`);
    const action = (await terminal.ask('Choice: ')).trim();
    if (action === TicketAction.Refund) {
      const refunded = await tickets.refund(ticket.ticketId, user.userId);
      terminal.print(`Ticket ${refunded.ticketId} refunded: ${formatCents(refunded.unitPrice * refunded.admits)}`);
    } else if (action === TicketAction.Cancel) {
      if (!(await confirm(terminal, 'Cancel this ticket without a refund? (y/n): '))) return;
      const cancelled = await tickets.cancel(ticket.ticketId, user.userId);
      terminal.print(`Ticket ${cancelled.ticketId} cancelled.`);
    } else if (action === TicketAction.Reschedule) {
      const visitDate = (await terminal.ask('New visit date (YYYY-MM-DD): ')).trim();
      const moved = await tickets.reschedule(ticket.ticketId, user.userId, visitDate);
      terminal.print(`Ticket ${moved.ticketId} moved to ${moved.visitDate}.`);
    }
  };

  await runMenu(terminal, services.log, {
    title: `Customer Menu (${user.name})`,
    options: CUSTOMER_OPTIONS,
    exit: CustomerCommand.Logout,
    handlers: {
      [CustomerCommand.BrowseParks]: async () => {
        const parks = await catalog.listParks();
        if (parks.length === 0) {
          terminal.print('No parks available.');
          return;
        }
        for (const park of parks) {
          terminal.print(describePark(park));
          if (park.description !== '') terminal.print(`    ${park.description}`);
        }
      },

      [CustomerCommand.AddTicket]: async () => {
        const park = await choose(terminal, 'Parks', await catalog.listParks(), describePark);
        if (!park) return;
        const visitDate = (await terminal.ask('Visit date (YYYY-MM-DD): ')).trim();
        const quantity = await askQuantity(terminal);
        await addToCart({ kind: 'TICKET', referenceId: park.parkId }, quantity, visitDate);
      },

      [CustomerCommand.AddMerchandise]: async () => {
        const item = await choose(terminal, 'Merchandise', await catalog.listMerchandise(), describeMerchandise);
        if (!item) return;
        const quantity = await askQuantity(terminal);
        await addToCart({ kind: 'MERCHANDISE', referenceId: item.sku }, quantity);
      },

      [CustomerCommand.ViewCart]: async () => {
        if (cart.items.length === 0) {
          terminal.print('Your cart is empty.');
          return;
        }
        cartLines(cart).forEach(line => terminal.print(line));
        terminal.print(`Total: ${formatCents(cartTotal(cart))}`);

        const answer = (await terminal.ask('Remove a line (number, Enter to keep): ')).trim();
        if (answer === '') return;
        const line = /^\d+$/.test(answer) ? cart.items[Number(answer) - 1] : undefined;
        if (!line) {
          terminal.print('Invalid selection.');
          return;
        }
        const amount = (await terminal.ask('Quantity to remove (Enter for all): ')).trim();
        if (amount !== '' && !/^\d+$/.test(amount)) throw new ValidationError('Quantity must be a whole number');
        const quantity = amount === '' ? undefined : Number(amount);
        const updated = checkout.removeItem(cart, line.lineId, quantity);
        await carts.save(updated);
        cart = updated;
        terminal.print(
          quantity === undefined || quantity >= line.quantity
            ? `Removed ${line.name}.`
            : `Removed ${quantity} x ${line.name}.`,
        );
      },

      [CustomerCommand.Checkout]: async () => {
        if (cart.items.length > 0) {
          cartLines(cart).forEach(line => terminal.print(line));
          terminal.print(`Total: ${formatCents(cartTotal(cart))}`);
          if (!(await confirm(terminal, 'Confirm purchase? (y/n): '))) return;
        }
        const result = await checkout.checkout(cart, user.userId);
        cart = result.cart;
        terminal.print(orderSummary(result.order));
        printCodes(result.tickets);
      },

      [CustomerCommand.ViewTickets]: async () => {
        const owned = await tickets.listForCustomer(user.userId);
        const ticket = await choose(terminal, 'Tickets', owned, describeTicket);
        if (ticket) await viewTicket(ticket);
      },

      [CustomerCommand.ContactSupport]: async () => {
        const description = await terminal.ask('Describe your issue: ');
        const opened = await support.open(user.userId, description);
        terminal.print(`Support ticket ${opened.supportTicketId} submitted.`);
      },

      [CustomerCommand.EditProfile]: async () => {
        profileLines(account).forEach(line => terminal.print(line));
        const changes = await askProfile(terminal, account);
        account = await accounts.updateProfile(user.userId, changes);
        terminal.print('Profile updated.');
      },

      [CustomerCommand.Logout]: async () => {
        await accounts.logout(user);
        terminal.print('Logged out.');
      },
    },
  });
}
