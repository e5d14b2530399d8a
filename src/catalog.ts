import type { AuditLog } from './audit';
import { NotFoundError, ValidationError, persisting } from './errors';
import { formatCents } from './pricing';
import type { DocumentStore, WriteOperation } from './repository';
import type { CatalogEntry, CatalogRef, ItemKind, Merchandise, Park } from './types';

export function kindLabel(kind: ItemKind): string {
  return kind === 'TICKET' ? 'Park' : 'Merchandise';
}

export function parkEntry(park: Park): CatalogEntry {
  return { kind: 'TICKET', referenceId: park.parkId, name: park.name, price: park.price, stock: park.stock };
}

export function merchandiseEntry(item: Merchandise): CatalogEntry {
  return { kind: 'MERCHANDISE', referenceId: item.sku, name: item.name, price: item.price, stock: item.stock };
}

export async function loadCatalogEntry(store: DocumentStore, ref: CatalogRef): Promise<CatalogEntry | null> {
  if (ref.kind === 'TICKET') {
    const park = await store.get('parks', ref.referenceId);
    return park ? parkEntry(park) : null;
  }
  const item = await store.get('merchandise', ref.referenceId);
  return item ? merchandiseEntry(item) : null;
}

/**
 * Stock change for one catalog entry. A negative delta is guarded so the
 * write fails instead of taking stock below zero.
 */
export function stockAdjustment(ref: CatalogRef, delta: number): WriteOperation {
  const update: { increment: { stock: number }; atLeast?: { stock: number } } =
    delta < 0
      ? { increment: { stock: delta }, atLeast: { stock: -delta } }
      : { increment: { stock: delta } };
  if (ref.kind === 'TICKET') {
    return { kind: 'update', collection: 'parks', key: ref.referenceId, update };
  }
  return { kind: 'update', collection: 'merchandise', key: ref.referenceId, update };
}

/**
 * Next id in a zero-padded sequence (P01, SKU001, ...), one past the highest
 * number already taken.
 */
export function nextSequentialId(existing: string[], prefix: string, width: number): string {
  const highest = existing.reduce((max, id) => {
    if (!id.startsWith(prefix)) return max;
    const n = Number(id.slice(prefix.length));
    return Number.isInteger(n) && n > max ? n : max;
  }, 0);
  return `${prefix}${String(highest + 1).padStart(width, '0')}`;
}

export interface NewMerchandise {
  name: string;
  price: number;
  stock: number;
}

export interface NewPark extends NewMerchandise {
  location: string;
  description: string;
}

/** Fields left undefined keep their stored value. Location and description exist on parks only. */
export interface DetailChanges {
  name?: string | undefined;
  location?: string | undefined;
  description?: string | undefined;
}

function assertName(value: string, field: string): string {
  const trimmed = value.trim();
  if (trimmed === '') throw new ValidationError(`${field} cannot be empty`);
  return trimmed;
}

function assertWholeNumber(value: number, field: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${field} must be a whole number >= 0`);
  }
  return value;
}

export class CatalogService {
  constructor(
    private readonly store: DocumentStore,
    private readonly audit: AuditLog,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async listParks(): Promise<Park[]> {
    const parks = await persisting('list parks', () => this.store.find('parks'));
    return parks.sort((a, b) => a.parkId.localeCompare(b.parkId));
  }

  async listMerchandise(): Promise<Merchandise[]> {
    const items = await persisting('list merchandise', () => this.store.find('merchandise'));
    return items.sort((a, b) => a.sku.localeCompare(b.sku));
  }

  getEntry(ref: CatalogRef): Promise<CatalogEntry | null> {
    return persisting('load catalog entry', () => loadCatalogEntry(this.store, ref));
  }

  async addPark(input: NewPark, actor: string): Promise<Park> {
    const name = assertName(input.name, 'Name');
    const location = assertName(input.location, 'Location');
    const price = assertWholeNumber(input.price, 'Ticket price');
    const stock = assertWholeNumber(input.stock, 'Ticket stock');

    const existing = await this.listParks();
    const park: Park = {
      parkId: nextSequentialId(existing.map(p => p.parkId), 'P', 2),
      name,
      location,
      description: input.description.trim(),
      price,
      stock,
      createdAt: this.now().toISOString(),
    };
    await persisting('add park', () => this.store.insertOne('parks', park));
    await this.audit.record(actor, 'CATALOG', `Added park ${park.name} (${park.parkId})`);
    return park;
  }

  async addMerchandise(input: NewMerchandise, actor: string): Promise<Merchandise> {
    const name = assertName(input.name, 'Name');
    const price = assertWholeNumber(input.price, 'Price');
    const stock = assertWholeNumber(input.stock, 'Stock');

    const existing = await this.listMerchandise();
    const item: Merchandise = {
      sku: nextSequentialId(existing.map(m => m.sku), 'SKU', 3),
      name,
      price,
      stock,
      createdAt: this.now().toISOString(),
    };
    await persisting('add merchandise', () => this.store.insertOne('merchandise', item));
    await this.audit.record(actor, 'CATALOG', `Added merchandise ${item.name} (${item.sku})`);
    return item;
  }

  async updatePrice(ref: CatalogRef, price: number, actor: string): Promise<void> {
    assertWholeNumber(price, 'Price');
    const updated = await persisting('update price', () =>
      ref.kind === 'TICKET'
        ? this.store.updateOne('parks', ref.referenceId, { set: { price } })
        : this.store.updateOne('merchandise', ref.referenceId, { set: { price } })
    );
    if (!updated) throw new NotFoundError(kindLabel(ref.kind), ref.referenceId);
    await this.audit.record(actor, 'CATALOG', `Set price of ${ref.referenceId} to ${formatCents(price)}`);
  }

  async updateDetails(ref: CatalogRef, changes: DetailChanges, actor: string): Promise<void> {
    const name = changes.name === undefined ? undefined : assertName(changes.name, 'Name');
    let updated: boolean;
    if (ref.kind === 'TICKET') {
      const set: Partial<Park> = {};
      if (name !== undefined) set.name = name;
      if (changes.location !== undefined) set.location = assertName(changes.location, 'Location');
      if (changes.description !== undefined) set.description = changes.description.trim();
      if (Object.keys(set).length === 0) throw new ValidationError('No details to update');
      updated = await persisting('update park', () => this.store.updateOne('parks', ref.referenceId, { set }));
    } else {
      if (changes.location !== undefined || changes.description !== undefined) {
        throw new ValidationError('Merchandise has no location or description');
      }
      if (name === undefined) throw new ValidationError('No details to update');
      updated = await persisting('update merchandise', () =>
        this.store.updateOne('merchandise', ref.referenceId, { set: { name } })
      );
    }
    if (!updated) throw new NotFoundError(kindLabel(ref.kind), ref.referenceId);
    await this.audit.record(actor, 'CATALOG', `Updated details of ${ref.referenceId}`);
  }

  async restock(ref: CatalogRef, quantity: number, actor: string): Promise<void> {
    if (!Number.isInteger(quantity) || quantity < 1) {
      throw new ValidationError('Restock quantity must be a positive whole number');
    }
    const updated = await persisting('restock', () =>
      ref.kind === 'TICKET'
        ? this.store.updateOne('parks', ref.referenceId, { increment: { stock: quantity } })
        : this.store.updateOne('merchandise', ref.referenceId, { increment: { stock: quantity } })
    );
    if (!updated) throw new NotFoundError(kindLabel(ref.kind), ref.referenceId);
    await this.audit.record(actor, 'CATALOG', `Restocked ${ref.referenceId} by ${quantity}`);
  }

  async remove(ref: CatalogRef, actor: string): Promise<void> {
    const removed = await persisting('remove catalog entry', () =>
      ref.kind === 'TICKET'
        ? this.store.deleteOne('parks', ref.referenceId)
        : this.store.deleteOne('merchandise', ref.referenceId)
    );
    if (!removed) throw new NotFoundError(kindLabel(ref.kind), ref.referenceId);
    await this.audit.record(actor, 'CATALOG', `Removed ${kindLabel(ref.kind).toLowerCase()} ${ref.referenceId}`);
  }
}
