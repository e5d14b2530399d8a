import { hashPassword } from './accounts';
import { persisting } from './errors';
import type { DocumentStore } from './repository';
import type { Merchandise, Park, User } from './types';

interface SeedUser {
  userId: string;
  name: string;
  email: string;
  password: string;
  role: User['role'];
}

const USERS: SeedUser[] = [
  { userId: 'admin01', name: 'Park Admin', email: 'admin@parks.test', password: 'admin123', role: 'ADMIN' },
  { userId: 'cust01', name: 'John Doe', email: 'john@parks.test', password: 'john123', role: 'CUSTOMER' },
  { userId: 'cust02', name: 'Jane Smith', email: 'jane@parks.test', password: 'jane123', role: 'CUSTOMER' },
];

const PARKS: Omit<Park, 'createdAt'>[] = [
  { parkId: 'P01', name: 'Bako National Park', location: 'Sarawak', description: 'Oldest national park.', price: 1000, stock: 20 },
  { parkId: 'P02', name: 'Niah National Park', location: 'Miri', description: 'Famous for caves.', price: 1500, stock: 50 },
];

const MERCHANDISE: Omit<Merchandise, 'createdAt'>[] = [
  { sku: 'SKU001', name: 'Park T-Shirt', price: 2500, stock: 100 },
  { sku: 'SKU002', name: 'Souvenir Mug', price: 1500, stock: 50 },
];

/**
 * Loads the starting accounts and catalog into an empty database. Called
 * once at start-up; returns false when users already exist.
 */
export async function seedInitialData(store: DocumentStore, now: Date = new Date()): Promise<boolean> {
  const existing = await persisting('count accounts', () => store.count('users'));
  if (existing > 0) return false;

  const createdAt = now.toISOString();
  await persisting('seed data', async () => {
    for (const { password, ...user } of USERS) {
      await store.insertOne('users', { ...user, passwordHash: hashPassword(password), createdAt });
    }
    for (const park of PARKS) {
      await store.insertOne('parks', { ...park, createdAt });
    }
    for (const item of MERCHANDISE) {
      await store.insertOne('merchandise', { ...item, createdAt });
    }
  });
  return true;
}
