import { ValidationError, persisting } from './errors';
import type { DocumentStore } from './repository';
import type { Order, User } from './types';

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;
const UNKNOWN_SEGMENT = 'UNKNOWN';

export interface ParkSales {
  parkId: string;
  name: string;
  tickets: number;
  revenue: number;
}

export interface MerchandiseSales {
  sku: string;
  name: string;
  units: number;
  revenue: number;
}

export interface SalesReport {
  orderCount: number;
  revenue: number;
  parks: ParkSales[];
  merchandise: MerchandiseSales[];
}

export interface PeriodReport extends SalesReport {
  from: string;
  to: string;
}

/** Sales grouped by one profile field of the buying customer. */
export interface SegmentSales {
  segment: string;
  customers: number;
  orderCount: number;
  revenue: number;
}

export type Segmentation = 'region' | 'ageGroup';

function byRevenue<T extends { revenue: number }>(id: (row: T) => string) {
  return (a: T, b: T) => b.revenue - a.revenue || id(a).localeCompare(id(b));
}

/** Aggregates confirmed orders. Line names are taken from the first order that sold the item. */
export function buildSalesReport(orders: Order[]): SalesReport {
  const parks = new Map<string, ParkSales>();
  const merchandise = new Map<string, MerchandiseSales>();
  let revenue = 0;

  for (const order of orders) {
    revenue += order.total;
    for (const item of order.items) {
      if (item.kind === 'TICKET') {
        const row = parks.get(item.referenceId) ?? { parkId: item.referenceId, name: item.name, tickets: 0, revenue: 0 };
        row.tickets += item.quantity;
        row.revenue += item.lineTotal;
        parks.set(item.referenceId, row);
      } else {
        const row = merchandise.get(item.referenceId) ?? { sku: item.referenceId, name: item.name, units: 0, revenue: 0 };
        row.units += item.quantity;
        row.revenue += item.lineTotal;
        merchandise.set(item.referenceId, row);
      }
    }
  }

  return {
    orderCount: orders.length,
    revenue,
    parks: [...parks.values()].sort(byRevenue<ParkSales>(row => row.parkId)),
    merchandise: [...merchandise.values()].sort(byRevenue<MerchandiseSales>(row => row.sku)),
  };
}

export async function loadSalesReport(store: DocumentStore): Promise<SalesReport> {
  const orders = await persisting('load orders', () => store.find('orders'));
  return buildSalesReport(orders);
}

function assertDate(value: string, field: string): string {
  const parsed = new Date(`${value}T00:00:00.000Z`);
  if (!DATE_RE.test(value) || Number.isNaN(parsed.getTime()) || parsed.toISOString().slice(0, 10) !== value) {
    throw new ValidationError(`${field} must be a date as YYYY-MM-DD`);
  }
  return value;
}

/** Orders placed between `from` and `to`, both inclusive, by UTC calendar day. */
export function buildPeriodReport(orders: Order[], from: string, to: string): PeriodReport {
  assertDate(from, 'Start date');
  assertDate(to, 'End date');
  if (from > to) throw new ValidationError(`Start date ${from} is after end date ${to}`);

  const inRange = orders.filter(order => {
    const day = order.createdAt.slice(0, 10);
    return day >= from && day <= to;
  });
  return { from, to, ...buildSalesReport(inRange) };
}

/** Customers without the field, or no longer on file, fall under UNKNOWN. */
export function salesBySegment(orders: Order[], users: User[], segmentation: Segmentation): SegmentSales[] {
  const byId = new Map(users.map(user => [user.userId, user]));
  const rows = new Map<string, SegmentSales & { buyers: Set<string> }>();

  for (const order of orders) {
    const segment = byId.get(order.customerId)?.[segmentation] ?? UNKNOWN_SEGMENT;
    const row = rows.get(segment) ?? { segment, customers: 0, orderCount: 0, revenue: 0, buyers: new Set<string>() };
    row.buyers.add(order.customerId);
    row.orderCount += 1;
    row.revenue += order.total;
    rows.set(segment, row);
  }

  return [...rows.values()]
    .map(({ buyers, ...row }) => ({ ...row, customers: buyers.size }))
    .sort(byRevenue<SegmentSales>(row => row.segment));
}

export async function loadPeriodReport(store: DocumentStore, from: string, to: string): Promise<PeriodReport> {
  const orders = await persisting('load orders', () => store.find('orders'));
  return buildPeriodReport(orders, from, to);
}

export async function loadSegmentSales(store: DocumentStore, segmentation: Segmentation): Promise<SegmentSales[]> {
  const [orders, users] = await persisting('load orders and accounts', () =>
    Promise.all([store.find('orders'), store.find('users')])
  );
  return salesBySegment(orders, users, segmentation);
}
