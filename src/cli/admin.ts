import { kindLabel } from '../catalog';
import { NotFoundError, ValidationError } from '../errors';
import { formatCents, parseCents } from '../pricing';
import { loadPeriodReport, loadSalesReport, loadSegmentSales, type SalesReport, type Segmentation } from '../reports';
import type { Services } from '../services';
import type { CatalogRef, ItemKind, User } from '../types';
import { describeAuditEntry, describeMerchandise, describePark, describeTicket } from './format';
import { askInteger, choose, confirm, runMenu, type MenuOption } from './menu';
import type { Terminal } from './terminal';

export enum AdminCommand {
  ManageParks = '1',
  ManageMerchandise = '2',
  Reports = '3',
  ResolveSupport = '4',
  ValidateTicket = '5',
  AuditLog = '6',
  Logout = '0',
}

const ADMIN_OPTIONS: MenuOption<AdminCommand>[] = [
  { command: AdminCommand.ManageParks, label: 'Manage Parks' },
  { command: AdminCommand.ManageMerchandise, label: 'Manage Merchandise' },
  { command: AdminCommand.Reports, label: 'Sales Reports' },
  { command: AdminCommand.ResolveSupport, label: 'Resolve Support Tickets' },
  { command: AdminCommand.ValidateTicket, label: 'Validate Ticket' },
  { command: AdminCommand.AuditLog, label: 'View Audit Log' },
  { command: AdminCommand.Logout, label: 'Logout' },
];

export enum CatalogCommand {
  List = '1',
  Add = '2',
  EditDetails = '3',
  EditPrice = '4',
  Restock = '5',
  Remove = '6',
  Back = '0',
}

export enum ReportCommand {
  Summary = '1',
  DateRange = '2',
  ByRegion = '3',
  ByAgeGroup = '4',
  Back = '0',
}

const AUDIT_PAGE = 50;

async function askPrice(terminal: Terminal, question: string): Promise<number> {
  const price = parseCents(await terminal.ask(question));
  if (price === null) throw new ValidationError('Price must be an amount such as 12.50');
  return price;
}

async function askStock(terminal: Terminal, question: string): Promise<number> {
  const stock = await askInteger(terminal, question);
  if (stock === null) throw new ValidationError('Stock must be a whole number');
  return stock;
}

/** Blank answers become undefined so the stored value is kept. */
async function askOptional(terminal: Terminal, question: string): Promise<string | undefined> {
  const answer = (await terminal.ask(question)).trim();
  return answer === '' ? undefined : answer;
}

function printSalesReport(terminal: Terminal, report: SalesReport): void {
  terminal.print(`Orders: ${report.orderCount}`);
  terminal.print(`Revenue: ${formatCents(report.revenue)}`);
  terminal.print('Ticket sales:');
  for (const row of report.parks) {
    terminal.print(`  ${row.name} (${row.parkId}): ${row.tickets} tickets, ${formatCents(row.revenue)}`);
  }
  terminal.print('Merchandise sales:');
  for (const row of report.merchandise) {
    terminal.print(`  ${row.name} (${row.sku}): ${row.units} units, ${formatCents(row.revenue)}`);
  }
}

async function runReports(services: Services, terminal: Terminal): Promise<void> {
  const { store } = services;

  const printSegments = async (segmentation: Segmentation, heading: string): Promise<void> => {
    const rows = await loadSegmentSales(store, segmentation);
    terminal.print(`${heading}:`);
    if (rows.length === 0) terminal.print('  No orders yet.');
    for (const row of rows) {
      terminal.print(`  ${row.segment}: ${row.customers} customer(s), ${row.orderCount} order(s), ${formatCents(row.revenue)}`);
    }
  };

  await runMenu(terminal, services.log, {
    title: 'Sales Reports',
    options: [
      { command: ReportCommand.Summary, label: 'All Sales' },
      { command: ReportCommand.DateRange, label: 'Sales by Date Range' },
      { command: ReportCommand.ByRegion, label: 'Sales by Region' },
      { command: ReportCommand.ByAgeGroup, label: 'Sales by Age Group' },
      { command: ReportCommand.Back, label: 'Back' },
    ],
    exit: ReportCommand.Back,
    handlers: {
      [ReportCommand.Summary]: async () => printSalesReport(terminal, await loadSalesReport(store)),

      [ReportCommand.DateRange]: async () => {
        const from = (await terminal.ask('From (YYYY-MM-DD): ')).trim();
        const to = (await terminal.ask('To (YYYY-MM-DD): ')).trim();
        const report = await loadPeriodReport(store, from, to);
        terminal.print(`Sales from ${report.from} to ${report.to}`);
        printSalesReport(terminal, report);
      },

      [ReportCommand.ByRegion]: () => printSegments('region', 'Sales by region'),

      [ReportCommand.ByAgeGroup]: () => printSegments('ageGroup', 'Sales by age group'),

      [ReportCommand.Back]: async () => undefined,
    },
  });
}

async function manageCatalog(services: Services, terminal: Terminal, admin: User, kind: ItemKind): Promise<void> {
  const { catalog } = services;
  const label = kindLabel(kind);

  const entries = async (): Promise<{ ref: CatalogRef; text: string }[]> =>
    kind === 'TICKET'
      ? (await catalog.listParks()).map(park => ({
          ref: { kind, referenceId: park.parkId },
          text: describePark(park),
        }))
      : (await catalog.listMerchandise()).map(item => ({
          ref: { kind, referenceId: item.sku },
          text: describeMerchandise(item),
        }));

  const pick = async (): Promise<CatalogRef | null> => {
    const picked = await choose(terminal, label === 'Park' ? 'Parks' : 'Merchandise', await entries(), e => e.text);
    return picked ? picked.ref : null;
  };

  await runMenu(terminal, services.log, {
    title: `Manage ${label === 'Park' ? 'Parks' : 'Merchandise'}`,
    options: [
      { command: CatalogCommand.List, label: 'List' },
      { command: CatalogCommand.Add, label: 'Add' },
      { command: CatalogCommand.EditDetails, label: 'Edit Details' },
      { command: CatalogCommand.EditPrice, label: 'Edit Price' },
      { command: CatalogCommand.Restock, label: 'Restock' },
      { command: CatalogCommand.Remove, label: 'Remove' },
      { command: CatalogCommand.Back, label: 'Back' },
    ],
    exit: CatalogCommand.Back,
    handlers: {
      [CatalogCommand.List]: async () => {
        const list = await entries();
        if (list.length === 0) terminal.print(`No ${label.toLowerCase()} entries.`);
        list.forEach(entry => terminal.print(entry.text));
      },

      [CatalogCommand.Add]: async () => {
        const name = await terminal.ask('Name: ');
        if (kind === 'TICKET') {
          const location = await terminal.ask('Location: ');
          const description = await terminal.ask('Description: ');
          const price = await askPrice(terminal, 'Ticket price: ');
          const stock = await askStock(terminal, 'Tickets available: ');
          const park = await catalog.addPark({ name, location, description, price, stock }, admin.userId);
          terminal.print(`Added ${describePark(park)}`);
        } else {
          const price = await askPrice(terminal, 'Price: ');
          const stock = await askStock(terminal, 'Stock: ');
          const item = await catalog.addMerchandise({ name, price, stock }, admin.userId);
          terminal.print(`Added ${describeMerchandise(item)}`);
        }
      },

      [CatalogCommand.EditDetails]: async () => {
        const ref = await pick();
        if (!ref) return;
        const name = await askOptional(terminal, 'Name (Enter to keep): ');
        if (kind === 'TICKET') {
          const location = await askOptional(terminal, 'Location (Enter to keep): ');
          const description = await askOptional(terminal, 'Description (Enter to keep): ');
          await catalog.updateDetails(ref, { name, location, description }, admin.userId);
        } else {
          await catalog.updateDetails(ref, { name }, admin.userId);
        }
        terminal.print(`Updated ${ref.referenceId}.`);
      },

      [CatalogCommand.EditPrice]: async () => {
        const ref = await pick();
        if (!ref) return;
        const entry = await catalog.getEntry(ref);
        if (!entry) throw new NotFoundError(label, ref.referenceId);
        terminal.print(`Current price of ${entry.name}: ${formatCents(entry.price)}`);
        const price = await askPrice(terminal, 'New price: ');
        await catalog.updatePrice(ref, price, admin.userId);
        terminal.print(`Price of ${ref.referenceId} set to ${formatCents(price)}.`);
      },

      [CatalogCommand.Restock]: async () => {
        const ref = await pick();
        if (!ref) return;
        const quantity = await askStock(terminal, 'Quantity to add: ');
        await catalog.restock(ref, quantity, admin.userId);
        terminal.print(`Restocked ${ref.referenceId} by ${quantity}.`);
      },

      [CatalogCommand.Remove]: async () => {
        const ref = await pick();
        if (!ref) return;
        if (!(await confirm(terminal, `Remove ${ref.referenceId}? (y/n): `))) return;
        await catalog.remove(ref, admin.userId);
        terminal.print(`Removed ${ref.referenceId}.`);
      },

      [CatalogCommand.Back]: async () => undefined,
    },
  });
}

export async function runAdminConsole(services: Services, terminal: Terminal, admin: User): Promise<void> {
  const { accounts, audit, support, tickets } = services;

  await runMenu(terminal, services.log, {
    title: `Admin Menu (${admin.name})`,
    options: ADMIN_OPTIONS,
    exit: AdminCommand.Logout,
    handlers: {
      [AdminCommand.ManageParks]: () => manageCatalog(services, terminal, admin, 'TICKET'),

      [AdminCommand.ManageMerchandise]: () => manageCatalog(services, terminal, admin, 'MERCHANDISE'),

      [AdminCommand.Reports]: () => runReports(services, terminal),

      [AdminCommand.ResolveSupport]: async () => {
        const open = await support.listOpen();
        const ticket = await choose(
          terminal,
          'Open support tickets',
          open,
          t => `[${t.supportTicketId}] ${t.customerId}: ${t.description}`,
        );
        if (!ticket) return;
        const note = await terminal.ask('Resolution note: ');
        await support.resolve(ticket.supportTicketId, note, admin.userId);
        terminal.print(`Support ticket ${ticket.supportTicketId} resolved.`);
      },

      [AdminCommand.ValidateTicket]: async () => {
        const ticketId = (await terminal.ask('Ticket ID: ')).trim();
        const ticket = await tickets.markUsed(ticketId, admin.userId);
        terminal.print(`Valid: ${describeTicket(ticket)}`);
      },

      [AdminCommand.AuditLog]: async () => {
        const entries = await audit.list();
        if (entries.length === 0) {
          terminal.print('Audit log is empty.');
          return;
        }
        entries.slice(0, AUDIT_PAGE).forEach(entry => terminal.print(describeAuditEntry(entry)));
      },

      [AdminCommand.Logout]: async () => {
        await accounts.logout(admin);
        terminal.print('Logged out.');
      },
    },
  });
}
