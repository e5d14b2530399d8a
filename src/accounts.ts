import { randomBytes, scryptSync, timingSafeEqual } from 'crypto';
import type { AuditLog } from './audit';
import {
  EmailTakenError,
  InvalidCredentialsError,
  NotFoundError,
  PersistenceError,
  ValidationError,
  persisting,
} from './errors';
import { nextSequentialId } from './catalog';
import { ConditionFailedError, type DocumentStore } from './repository';
import type { AgeGroup, Gender, Profile, User, VisitorType } from './types';

export const AGE_GROUPS: readonly AgeGroup[] = ['<18', '18-24', '25-34', '35-44', '45-54', '55+'];
export const GENDERS: readonly Gender[] = ['Male', 'Female'];
export const VISITOR_TYPES: readonly VisitorType[] = ['local', 'domestic', 'tourist'];

const KEY_LENGTH = 32;

export function hashPassword(password: string, salt: string = randomBytes(16).toString('hex')): string {
  const hash = scryptSync(password, salt, KEY_LENGTH).toString('hex');
  return `${salt}:${hash}`;
}

export function verifyPassword(password: string, stored: string): boolean {
  const [salt, hash] = stored.split(':');
  if (!salt || !hash) return false;
  const expected = Buffer.from(hash, 'hex');
  const actual = scryptSync(password, salt, KEY_LENGTH);
  return expected.length === actual.length && timingSafeEqual(expected, actual);
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export class AccountService {
  constructor(
    private readonly store: DocumentStore,
    private readonly audit: AuditLog,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async findByEmail(email: string): Promise<User | null> {
    const users = await persisting('look up account', () =>
      this.store.find('users', { email: normalizeEmail(email) })
    );
    return users[0] ?? null;
  }

  getUser(userId: string): Promise<User | null> {
    return persisting('load account', () => this.store.get('users', userId));
  }

  /** Unknown email and wrong password fail the same way. */
  async login(email: string, password: string): Promise<User> {
    const user = await this.findByEmail(email);
    if (!user || !verifyPassword(password, user.passwordHash)) {
      throw new InvalidCredentialsError();
    }
    await this.audit.record(user.userId, 'USER', 'Logged in');
    return user;
  }

  async logout(user: User): Promise<void> {
    await this.audit.record(user.userId, 'USER', 'Logged out');
  }

  async register(name: string, email: string, password: string): Promise<User> {
    const trimmedName = name.trim();
    const normalized = normalizeEmail(email);
    if (trimmedName === '') throw new ValidationError('Name cannot be empty');
    if (normalized === '') throw new ValidationError('Email cannot be empty');
    if (password.length < 3) throw new ValidationError('Password must be at least 3 characters');

    if (await this.findByEmail(normalized)) {
      throw new EmailTakenError(normalized);
    }

    const customers = await persisting('list accounts', () => this.store.find('users', { role: 'CUSTOMER' }));
    const user: User = {
      userId: nextSequentialId(customers.map(u => u.userId), 'cust', 2),
      name: trimmedName,
      email: normalized,
      passwordHash: hashPassword(password),
      role: 'CUSTOMER',
      createdAt: this.now().toISOString(),
    };

    try {
      await this.store.insertOne('users', user);
    } catch (err) {
      if (err instanceof ConditionFailedError) {
        throw new ValidationError('Registration clashed with another sign-up; try again');
      }
      throw new PersistenceError('Could not register account', err);
    }
    await this.audit.record(user.userId, 'USER', 'Registered new account');
    return user;
  }

  /** Writes only the fields present in `changes`; returns the stored account. */
  async updateProfile(userId: string, changes: Profile): Promise<User> {
    const set: Profile = {};
    if (changes.ageGroup !== undefined) {
      if (!AGE_GROUPS.includes(changes.ageGroup)) throw new ValidationError(`Unknown age group ${changes.ageGroup}`);
      set.ageGroup = changes.ageGroup;
    }
    if (changes.gender !== undefined) {
      if (!GENDERS.includes(changes.gender)) throw new ValidationError(`Unknown gender ${changes.gender}`);
      set.gender = changes.gender;
    }
    if (changes.region !== undefined) {
      const region = changes.region.trim();
      if (region === '') throw new ValidationError('Region cannot be empty');
      set.region = region;
    }
    if (changes.visitorType !== undefined) {
      if (!VISITOR_TYPES.includes(changes.visitorType)) {
        throw new ValidationError(`Unknown visitor type ${changes.visitorType}`);
      }
      set.visitorType = changes.visitorType;
    }
    if (changes.marketingOptIn !== undefined) set.marketingOptIn = changes.marketingOptIn;

    if (Object.keys(set).length > 0) {
      const updated = await persisting('update profile', () => this.store.updateOne('users', userId, { set }));
      if (!updated) throw new NotFoundError('User', userId);
      await this.audit.record(userId, 'USER', `Updated profile (${Object.keys(set).join(', ')})`);
    }

    const user = await this.getUser(userId);
    if (!user) throw new NotFoundError('User', userId);
    return user;
  }
}
