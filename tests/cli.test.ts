import { runApp } from '../src/cli/main-menu';
import { choose, reportError } from '../src/cli/menu';
import { InputClosedError } from '../src/cli/terminal';
import { ValidationError } from '../src/errors';
import { silentLogger, type Logger } from '../src/logger';
import { seedInitialData } from '../src/seed';
import { createServices } from '../src/services';
import type { Order, SupportTicket } from '../src/types';
import { NOW, ScriptedTerminal, clock, makeTicket, sequentialIds, storeWith } from './support/fixtures';
import type { MemoryDocumentStore } from './support/memory-store';

// ---------------------------------------------------------------------------
// Harness: seeded in-memory store, plain-text ticket codes, scripted input
// ---------------------------------------------------------------------------

const JOHN = ['1', 'john@parks.test', 'john123'];
const ADMIN = ['1', 'admin@parks.test', 'admin123'];

let store: MemoryDocumentStore;
let ids: () => string;

async function session(answers: string[]): Promise<ScriptedTerminal> {
  const services = createServices(store, { qrCodes: false, refundCutoffHours: 24 }, silentLogger, {
    now: clock,
    newId: ids,
  });
  const terminal = new ScriptedTerminal(answers);
  await runApp(services, terminal);
  return terminal;
}

beforeEach(async () => {
  store = await storeWith();
  await seedInitialData(store, NOW);
  ids = sequentialIds('id');
});

// ---------------------------------------------------------------------------
// Main menu
// ---------------------------------------------------------------------------

describe('main menu', () => {
  test('Exit says goodbye', async () => {
    const terminal = await session(['0']);

    expect(terminal.output.slice(0, 6)).toEqual(['=== Park Booking Desk ===', '', '--- Main Menu ---', '1. Login', '2. Register', '0. Exit']);
    expect(terminal.output[terminal.output.length - 1]).toBe('Goodbye.');
    expect(terminal.remaining).toBe(0);
  });

  test('unknown choices are reported and the menu repeats', async () => {
    const terminal = await session(['9', '0']);

    expect(terminal.output).toContain('Invalid choice.');
    expect(terminal.prompts).toEqual(['Choice: ', 'Choice: ']);
  });

  test('end of input anywhere ends the program cleanly', async () => {
    const terminal = await session([...JOHN, '2']);

    expect(terminal.prompts[terminal.prompts.length - 1]).toBe('Select (number, 0 to go back): ');
    expect(terminal.output[terminal.output.length - 1]).toBe('Goodbye.');
  });

  test('a failed login returns to the main menu', async () => {
    const terminal = await session(['1', 'john@parks.test', 'wrong', '0']);

    expect(terminal.output).toContain('Error: Invalid email or password');
  });

  test('Register creates the next customer account', async () => {
    const terminal = await session(['2', 'Ann Lee', 'ann@parks.test', 'test-secret', '0']);

    expect(terminal.output).toContain('Registered ann@parks.test as cust03. You can now log in.');
    expect(store.all('users').map(u => u.userId)).toContain('cust03');
  });
});

// ---------------------------------------------------------------------------
// Customer console
// ---------------------------------------------------------------------------

describe('customer console', () => {
  const BUY = ['2', '1', '2030-01-08', '2', '3', '1', '1', '5', 'y'];

  test('add a ticket and merchandise, then check out', async () => {
    const terminal = await session([...JOHN, ...BUY, '0', '0']);

    expect(terminal.output).toContain('Added to cart. Cart total: $20.00');
    expect(terminal.output).toContain('Added to cart. Cart total: $45.00');
    expect(terminal.output).toContain('Order id-2: 2 line(s), total $45.00');
    expect(terminal.output).toContain('[id-3] Bako National Park on 2030-01-08 x2 (ISSUED)');
    expect(terminal.output).toContain('id-3');
    expect(store.all('parks').find(p => p.parkId === 'P01')?.stock).toBe(18);
    expect(store.all('merchandise').find(m => m.sku === 'SKU001')?.stock).toBe(99);
    expect(store.all('carts')).toEqual([]);
  });

  test('a bought ticket can be refunded from View Tickets', async () => {
    const terminal = await session([...JOHN, ...BUY, '6', '1', '1', '0', '0']);

    expect(terminal.output).toContain('Status    : ISSUED');
    expect(terminal.output).toContain('Ticket id-3 refunded: $20.00');
    expect(store.all('tickets')[0]?.status).toBe('REFUNDED');
    expect(store.all('parks').find(p => p.parkId === 'P01')?.stock).toBe(20);
  });

  test('the cart is kept between sessions', async () => {
    await session([...JOHN, '3', '2', '1', '0', '0']);
    const terminal = await session([...JOHN, '4', '', '0', '0']);

    expect(terminal.output).toContain('1. Souvenir Mug - Qty: 1 @ $15.00 = $15.00');
    expect(terminal.output).toContain('Total: $15.00');
  });

  test('View Cart removes a line', async () => {
    const terminal = await session([...JOHN, '3', '2', '1', '4', '1', '', '0', '0']);

    expect(terminal.output).toContain('Removed Souvenir Mug.');
    expect(store.all('carts')).toEqual([]);
  });

  test('View Cart removes part of a line', async () => {
    const terminal = await session([...JOHN, '3', '2', '3', '4', '1', '2', '0', '0']);

    expect(terminal.prompts).toContain('Quantity to remove (Enter for all): ');
    expect(terminal.output).toContain('Removed 2 x Souvenir Mug.');
    expect(store.all('carts')[0]?.items.map(i => [i.referenceId, i.quantity])).toEqual([['SKU002', 1]]);
  });

  test('checkout clears the saved cart without a separate delete', async () => {
    store.failOn('deleteOne', new Error('network down'));

    const terminal = await session([...JOHN, ...BUY, '0', '0']);
    const next = await session([...JOHN, '4', '0', '0']);

    expect(terminal.output).toContain('Order id-2: 2 line(s), total $45.00');
    expect(terminal.output).toContain('[id-3] Bako National Park on 2030-01-08 x2 (ISSUED)');
    expect(terminal.output).not.toContain('Something went wrong. Please try again.');
    expect(store.calls).not.toContain('deleteOne');
    expect(store.all('carts')).toEqual([]);
    expect(next.output).toContain('Your cart is empty.');
  });

  test('a ticket can be moved to another date', async () => {
    const terminal = await session([...JOHN, ...BUY, '6', '1', '3', '2030-01-15', '0', '0']);

    expect(terminal.output).toContain('Ticket id-3 moved to 2030-01-15.');
    expect(store.all('tickets')[0]).toMatchObject({ visitDate: '2030-01-15', status: 'ISSUED' });
  });

  test('Edit Profile stores the answers', async () => {
    const terminal = await session([...JOHN, '8', '25-34', 'female', 'Sarawak', 'tourist', 'y', '0', '0']);

    expect(terminal.output).toContain('Age group   : unset');
    expect(terminal.prompts).toContain('Gender (Male/Female, Enter to keep unset): ');
    expect(terminal.output).toContain('Profile updated.');
    expect(store.all('users').find(u => u.userId === 'cust01')).toMatchObject({
      ageGroup: '25-34',
      gender: 'Female',
      region: 'Sarawak',
      visitorType: 'tourist',
      marketingOptIn: true,
    });
  });

  test('Edit Profile rejects an unknown age group', async () => {
    const terminal = await session([...JOHN, '8', '99', '0', '0']);

    expect(terminal.output).toContain('Error: Age group must be one of <18, 18-24, 25-34, 35-44, 45-54, 55+');
    expect(store.all('users').find(u => u.userId === 'cust01')?.ageGroup).toBeUndefined();
  });

  test('a past visit date is rejected', async () => {
    const terminal = await session([...JOHN, '2', '1', '2020-01-01', '1', '0', '0']);

    expect(terminal.output).toContain('Error: Visit date must be a YYYY-MM-DD date after today (got "2020-01-01")');
    expect(store.all('carts')).toEqual([]);
  });

  test('a quantity that is not a number is rejected', async () => {
    const terminal = await session([...JOHN, '3', '1', 'lots', '0', '0']);

    expect(terminal.output).toContain('Error: Quantity must be a whole number');
  });

  test('checking out an empty cart', async () => {
    const terminal = await session([...JOHN, '5', '0', '0']);

    expect(terminal.output).toContain('Error: Cart is empty');
    expect(store.all('orders')).toEqual([]);
  });

  test('Contact Support opens a ticket', async () => {
    const terminal = await session([...JOHN, '7', 'Gate was closed', '0', '0']);

    expect(terminal.output).toContain('Support ticket id-2 submitted.');
    expect(store.all('supportTickets')[0]).toMatchObject({ customerId: 'cust01', description: 'Gate was closed' });
  });
});

// ---------------------------------------------------------------------------
// Admin console
// ---------------------------------------------------------------------------

describe('admin console', () => {
  test('Manage Parks adds a park', async () => {
    const terminal = await session([...ADMIN, '1', '2', 'Mulu', 'Miri', 'Caves', '20.00', '30', '0', '0', '0']);

    expect(terminal.output).toContain('Added Mulu (P03), Miri: $20.00, 30 left');
    expect(store.all('parks').find(p => p.parkId === 'P03')).toMatchObject({ price: 2000, stock: 30 });
  });

  test('Manage Merchandise rejects a malformed price', async () => {
    const terminal = await session([...ADMIN, '2', '2', 'Cap', 'cheap', '0', '0', '0']);

    expect(terminal.output).toContain('Error: Price must be an amount such as 12.50');
    expect(store.all('merchandise')).toHaveLength(2);
  });

  test('Manage Parks edits details, keeping blank answers', async () => {
    const terminal = await session([...ADMIN, '1', '3', '1', 'Bako Park', '', 'New trails.', '0', '0', '0']);

    expect(terminal.output).toContain('Updated P01.');
    expect(store.all('parks').find(p => p.parkId === 'P01')).toMatchObject({
      name: 'Bako Park',
      location: 'Sarawak',
      description: 'New trails.',
    });
  });

  test('Edit Price shows the current price first', async () => {
    const terminal = await session([...ADMIN, '2', '4', '2', '18.00', '0', '0', '0']);

    expect(terminal.output).toContain('Current price of Souvenir Mug: $15.00');
    expect(terminal.output).toContain('Price of SKU002 set to $18.00.');
    expect(store.all('merchandise').find(m => m.sku === 'SKU002')?.price).toBe(1800);
  });

  test('Validate Ticket marks it used', async () => {
    await store.insertOne('tickets', makeTicket());

    const terminal = await session([...ADMIN, '5', 't-1', '0', '0']);

    expect(terminal.output).toContain('Valid: [t-1] Bako National Park on 2030-01-08 x2 (USED)');
  });

  describe('Sales Reports', () => {
    const order: Order = {
      orderId: 'o-1',
      customerId: 'cust01',
      items: [
        { lineId: 'TICKET:P01:2030-01-08', kind: 'TICKET', referenceId: 'P01', name: 'Bako National Park', unitPrice: 1000, quantity: 2, visitDate: '2030-01-08', lineTotal: 2000 },
      ],
      total: 2000,
      status: 'CONFIRMED',
      createdAt: NOW.toISOString(),
    };
    const december: Order = {
      ...order,
      orderId: 'o-2',
      customerId: 'cust02',
      items: [
        { lineId: 'MERCHANDISE:SKU002', kind: 'MERCHANDISE', referenceId: 'SKU002', name: 'Souvenir Mug', unitPrice: 1500, quantity: 1, lineTotal: 1500 },
      ],
      total: 1500,
      createdAt: '2029-12-15T10:00:00.000Z',
    };

    beforeEach(async () => {
      await store.insertOne('orders', order);
      await store.insertOne('orders', december);
    });

    test('All Sales summarises stored orders', async () => {
      const terminal = await session([...ADMIN, '3', '1', '0', '0', '0']);

      expect(terminal.output).toEqual(
        expect.arrayContaining(['Orders: 2', 'Revenue: $35.00', '  Bako National Park (P01): 2 tickets, $20.00'])
      );
    });

    test('a date range keeps only the orders placed in it', async () => {
      const terminal = await session([...ADMIN, '3', '2', '2030-01-01', '2030-01-01', '0', '0', '0']);

      expect(terminal.output).toEqual(
        expect.arrayContaining(['Sales from 2030-01-01 to 2030-01-01', 'Orders: 1', 'Revenue: $20.00'])
      );
    });

    test('by region groups customers by their profile', async () => {
      await store.updateOne('users', 'cust01', { set: { region: 'Sarawak' } });

      const terminal = await session([...ADMIN, '3', '3', '0', '0', '0']);

      expect(terminal.output).toEqual(
        expect.arrayContaining([
          'Sales by region:',
          '  Sarawak: 1 customer(s), 1 order(s), $20.00',
          '  UNKNOWN: 1 customer(s), 1 order(s), $15.00',
        ])
      );
    });

    test('by age group', async () => {
      await store.updateOne('users', 'cust02', { set: { ageGroup: '18-24' } });

      const terminal = await session([...ADMIN, '3', '4', '0', '0', '0']);

      expect(terminal.output).toEqual(
        expect.arrayContaining([
          'Sales by age group:',
          '  UNKNOWN: 1 customer(s), 1 order(s), $20.00',
          '  18-24: 1 customer(s), 1 order(s), $15.00',
        ])
      );
    });
  });

  test('Resolve Support Tickets closes the chosen ticket', async () => {
    const ticket: SupportTicket = {
      supportTicketId: 's-1',
      customerId: 'cust01',
      description: 'Lost ticket',
      status: 'OPEN',
      resolution: '',
      createdAt: NOW.toISOString(),
    };
    await store.insertOne('supportTickets', ticket);

    const terminal = await session([...ADMIN, '4', '1', 'Reissued', '0', '0']);

    expect(terminal.output).toContain('1. [s-1] cust01: Lost ticket');
    expect(terminal.output).toContain('Support ticket s-1 resolved.');
    expect(store.all('supportTickets')[0]).toMatchObject({ status: 'RESOLVED', resolution: 'Reissued' });
  });

  test('Audit Log shows the login', async () => {
    const terminal = await session([...ADMIN, '6', '0', '0']);

    expect(terminal.output).toContain('[2030-01-01T12:00:00.000Z] [USER] admin01: Logged in');
  });
});

// ---------------------------------------------------------------------------
// Menu helpers
// ---------------------------------------------------------------------------

describe('reportError', () => {
  test('domain errors print their message', () => {
    const terminal = new ScriptedTerminal([]);

    reportError(terminal, silentLogger, new ValidationError('Name cannot be empty'));

    expect(terminal.output).toEqual(['Error: Name cannot be empty']);
  });

  test('anything else is logged and reported without detail', () => {
    const terminal = new ScriptedTerminal([]);
    const log: jest.MockedFunction<Logger> = jest.fn();

    reportError(terminal, log, new Error('socket hang up'));

    expect(terminal.output).toEqual(['Something went wrong. Please try again.']);
    expect(log).toHaveBeenCalledWith({ level: 'error', action: 'cli.error', error: 'Error: socket hang up' });
  });

  test('end of input is rethrown', () => {
    expect(() => reportError(new ScriptedTerminal([]), silentLogger, new InputClosedError())).toThrow(InputClosedError);
  });
});

test('choose rejects an out-of-range selection', async () => {
  const terminal = new ScriptedTerminal(['3']);

  await expect(choose(terminal, 'Parks', ['a', 'b'], s => s)).resolves.toBeNull();
  expect(terminal.output).toEqual(['', 'Parks:', '1. a', '2. b', '0. Back', 'Invalid selection.']);
});
