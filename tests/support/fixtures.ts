import { AuditLog } from '../../src/audit';
import { silentLogger } from '../../src/logger';
import type { Merchandise, Park, Ticket } from '../../src/types';
import { InputClosedError, type Terminal } from '../../src/cli/terminal';
import { MemoryDocumentStore } from './memory-store';

export const NOW = new Date('2030-01-01T12:00:00.000Z');
export const TOMORROW = '2030-01-02';
export const NEXT_WEEK = '2030-01-08';

export const clock = (): Date => NOW;

/** ids "<prefix>-1", "<prefix>-2", ... */
export function sequentialIds(prefix = 'id'): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}

export function makePark(overrides: Partial<Park> = {}): Park {
  return {
    parkId: 'P01',
    name: 'Bako National Park',
    location: 'Sarawak',
    description: 'Coastal trails.',
    price: 1000,
    stock: 20,
    createdAt: NOW.toISOString(),
    ...overrides,
  };
}

export function makeMerchandise(overrides: Partial<Merchandise> = {}): Merchandise {
  return {
    sku: 'SKU001',
    name: 'Park T-Shirt',
    price: 500,
    stock: 10,
    createdAt: NOW.toISOString(),
    ...overrides,
  };
}

export function makeTicket(overrides: Partial<Ticket> = {}): Ticket {
  return {
    ticketId: 't-1',
    orderId: 'o-1',
    customerId: 'cust01',
    parkId: 'P01',
    parkName: 'Bako National Park',
    visitDate: NEXT_WEEK,
    admits: 2,
    unitPrice: 1000,
    status: 'ISSUED',
    createdAt: NOW.toISOString(),
    updatedAt: NOW.toISOString(),
    ...overrides,
  };
}

export async function storeWith(parks: Park[] = [], merchandise: Merchandise[] = []): Promise<MemoryDocumentStore> {
  const store = new MemoryDocumentStore();
  for (const park of parks) await store.insertOne('parks', park);
  for (const item of merchandise) await store.insertOne('merchandise', item);
  store.calls.length = 0;
  return store;
}

export function auditFor(store: MemoryDocumentStore): AuditLog {
  return new AuditLog(store, { now: clock, newId: sequentialIds('audit'), log: silentLogger });
}

/**
 * Answers prompts from a script; running out of answers behaves like a
 * closed stdin. `output` holds printed lines, prompts are kept in `prompts`.
 */
export class ScriptedTerminal implements Terminal {
  readonly output: string[] = [];
  readonly prompts: string[] = [];
  closed = false;

  constructor(private readonly answers: string[]) {}

  async ask(question: string): Promise<string> {
    this.prompts.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) throw new InputClosedError();
    return answer;
  }

  print(line = ''): void {
    this.output.push(line);
  }

  close(): void {
    this.closed = true;
  }

  get remaining(): number {
    return this.answers.length;
  }
}
