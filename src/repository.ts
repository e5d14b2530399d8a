import {
  ConditionalCheckFailedException,
  DynamoDBClient,
  TransactionCanceledException,
} from '@aws-sdk/client-dynamodb';
import {
  DeleteCommand,
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  ScanCommand,
  TransactWriteCommand,
  UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import type { TransactWriteCommandInput } from '@aws-sdk/lib-dynamodb';
import type { AppConfig } from './config';
import type {
  AuditEntry,
  Merchandise,
  Order,
  Park,
  SavedCart,
  SupportTicket,
  Ticket,
  User,
} from './types';

// ---------------------------------------------------------------------------
// Collections
// ---------------------------------------------------------------------------

export interface Collections {
  parks: Park;
  merchandise: Merchandise;
  orders: Order;
  tickets: Ticket;
  users: User;
  supportTickets: SupportTicket;
  auditLog: AuditEntry;
  carts: SavedCart;
}

export type CollectionName = keyof Collections;

export const KEY_ATTRIBUTES = {
  parks: 'parkId',
  merchandise: 'sku',
  orders: 'orderId',
  tickets: 'ticketId',
  users: 'userId',
  supportTickets: 'supportTicketId',
  auditLog: 'entryId',
  carts: 'customerId',
} as const satisfies { [C in CollectionName]: keyof Collections[C] & string };

/** DynamoDB allows at most 100 actions in one TransactWriteItems call. */
export const MAX_TRANSACTION_OPERATIONS = 100;

// ---------------------------------------------------------------------------
// Store contract
// ---------------------------------------------------------------------------

type ScalarKeys<T> = {
  [K in keyof T]-?: NonNullable<T[K]> extends string | number | boolean ? K : never;
}[keyof T];

type NumericKeys<T> = {
  [K in keyof T]-?: T[K] extends number ? K : never;
}[keyof T];

/** Equality match on scalar attributes. */
export type Filter<T> = Partial<Pick<T, ScalarKeys<T>>>;

export interface Update<T> {
  set?: Partial<T>;
  increment?: Partial<Record<NumericKeys<T>, number>>;
  /** Equality guards: the write only applies when every attribute matches. */
  where?: Filter<T>;
  /** Numeric guards: the write only applies when every attribute is >= the value. */
  atLeast?: Partial<Record<NumericKeys<T>, number>>;
}

type InsertOperation = {
  [C in CollectionName]: { kind: 'insert'; collection: C; record: Collections[C] };
}[CollectionName];

type UpdateOperation = {
  [C in CollectionName]: { kind: 'update'; collection: C; key: string; update: Update<Collections[C]> };
}[CollectionName];

/** Unconditional: deleting a missing record is not a failure. */
type DeleteOperation = {
  [C in CollectionName]: { kind: 'delete'; collection: C; key: string };
}[CollectionName];

export type WriteOperation = InsertOperation | UpdateOperation | DeleteOperation;

export interface DocumentStore {
  find<C extends CollectionName>(collection: C, filter?: Filter<Collections[C]>): Promise<Collections[C][]>;
  get<C extends CollectionName>(collection: C, key: string): Promise<Collections[C] | null>;
  count<C extends CollectionName>(collection: C, filter?: Filter<Collections[C]>): Promise<number>;
  /** Fails with ConditionFailedError when a record with the same key exists. */
  insertOne<C extends CollectionName>(collection: C, record: Collections[C]): Promise<string>;
  replaceOne<C extends CollectionName>(collection: C, record: Collections[C]): Promise<void>;
  /** Resolves false when the record is missing or a guard does not hold. */
  updateOne<C extends CollectionName>(collection: C, key: string, update: Update<Collections[C]>): Promise<boolean>;
  deleteOne<C extends CollectionName>(collection: C, key: string): Promise<boolean>;
  /** All or nothing. A failed guard raises ConditionFailedError with the operation's index. */
  transact(operations: WriteOperation[]): Promise<void>;
}

export class ConditionFailedError extends Error {
  constructor(public readonly operationIndex?: number | undefined) {
    super(
      operationIndex === undefined
        ? 'Conditional write failed'
        : `Conditional write failed at operation ${operationIndex}`,
    );
    this.name = 'ConditionFailedError';
  }
}

export function recordKey(collection: CollectionName, record: object): string {
  const value: unknown = Reflect.get(record, KEY_ATTRIBUTES[collection]);
  if (typeof value !== 'string' || value === '') {
    throw new Error(`Record for ${collection} has no ${KEY_ATTRIBUTES[collection]}`);
  }
  return value;
}

// ---------------------------------------------------------------------------
// Expression builders
// ---------------------------------------------------------------------------

export interface UpdateExpressionParts {
  UpdateExpression: string;
  ConditionExpression: string;
  ExpressionAttributeNames: Record<string, string>;
  ExpressionAttributeValues: Record<string, unknown>;
}

/**
 * Builds SET / condition expressions for an update addressed by primary key.
 * The key attribute is always `#pk` and must exist, so updates never upsert.
 */
export function buildUpdateExpression(keyAttribute: string, update: Update<object>): UpdateExpressionParts {
  const names: Record<string, string> = { '#pk': keyAttribute };
  const values: Record<string, unknown> = {};
  const assignments: string[] = [];
  const conditions: string[] = ['attribute_exists(#pk)'];
  let next = 0;

  const bind = (attribute: string, value: unknown): [string, string] => {
    const index = next++;
    names[`#a${index}`] = attribute;
    values[`:v${index}`] = value;
    return [`#a${index}`, `:v${index}`];
  };

  for (const [attribute, value] of Object.entries(update.set ?? {})) {
    if (value === undefined) continue;
    const [name, placeholder] = bind(attribute, value);
    assignments.push(`${name} = ${placeholder}`);
  }
  for (const [attribute, delta] of Object.entries(update.increment ?? {})) {
    if (typeof delta !== 'number') continue;
    const [name, placeholder] = bind(attribute, delta);
    assignments.push(`${name} = ${name} + ${placeholder}`);
  }
  for (const [attribute, value] of Object.entries(update.where ?? {})) {
    if (value === undefined) continue;
    const [name, placeholder] = bind(attribute, value);
    conditions.push(`${name} = ${placeholder}`);
  }
  for (const [attribute, minimum] of Object.entries(update.atLeast ?? {})) {
    if (typeof minimum !== 'number') continue;
    const [name, placeholder] = bind(attribute, minimum);
    conditions.push(`${name} >= ${placeholder}`);
  }

  if (assignments.length === 0) {
    throw new Error('Update has no attributes to write');
  }

  return {
    UpdateExpression: `SET ${assignments.join(', ')}`,
    ConditionExpression: conditions.join(' AND '),
    ExpressionAttributeNames: names,
    ExpressionAttributeValues: values,
  };
}

export interface FilterExpressionParts {
  FilterExpression?: string;
  ExpressionAttributeNames?: Record<string, string>;
  ExpressionAttributeValues?: Record<string, unknown>;
}

export function buildFilterExpression(filter: object): FilterExpressionParts {
  const entries = Object.entries(filter).filter(([, value]) => value !== undefined);
  if (entries.length === 0) return {};

  const names: Record<string, string> = {};
  const values: Record<string, unknown> = {};
  const clauses = entries.map(([attribute, value], index) => {
    names[`#f${index}`] = attribute;
    values[`:f${index}`] = value;
    return `#f${index} = :f${index}`;
  });

  return {
    FilterExpression: clauses.join(' AND '),
    ExpressionAttributeNames: names,
    ExpressionAttributeValues: values,
  };
}

// ---------------------------------------------------------------------------
// DynamoDB implementation
// ---------------------------------------------------------------------------

export function createDocumentClient(config: Pick<AppConfig, 'region' | 'endpoint'>): DynamoDBDocumentClient {
  const client = new DynamoDBClient({
    region: config.region,
    ...(config.endpoint ? { endpoint: config.endpoint } : {}),
  });
  return DynamoDBDocumentClient.from(client, {
    marshallOptions: { removeUndefinedValues: true },
  });
}

export class DynamoDocumentStore implements DocumentStore {
  constructor(
    private readonly client: DynamoDBDocumentClient,
    private readonly tablePrefix: string,
  ) {}

  /** Releases the client's sockets so the process can exit. */
  destroy(): void {
    this.client.destroy();
  }

  tableName(collection: CollectionName): string {
    return `${this.tablePrefix}-${collection}`;
  }

  async find<C extends CollectionName>(collection: C, filter?: Filter<Collections[C]>): Promise<Collections[C][]> {
    const items: Collections[C][] = [];
    let startKey: Record<string, unknown> | undefined;

    do {
      const result = await this.client.send(
        new ScanCommand({
          TableName: this.tableName(collection),
          ...buildFilterExpression(filter ?? {}),
          ...(startKey ? { ExclusiveStartKey: startKey } : {}),
        })
      );
      for (const item of result.Items ?? []) {
        items.push(item as Collections[C]);
      }
      startKey = result.LastEvaluatedKey;
    } while (startKey);

    return items;
  }

  async get<C extends CollectionName>(collection: C, key: string): Promise<Collections[C] | null> {
    const result = await this.client.send(
      new GetCommand({
        TableName: this.tableName(collection),
        Key: { [KEY_ATTRIBUTES[collection]]: key },
      })
    );

    return result.Item ? (result.Item as Collections[C]) : null;
  }

  async count<C extends CollectionName>(collection: C, filter?: Filter<Collections[C]>): Promise<number> {
    let total = 0;
    let startKey: Record<string, unknown> | undefined;

    do {
      const result = await this.client.send(
        new ScanCommand({
          TableName: this.tableName(collection),
          Select: 'COUNT',
          ...buildFilterExpression(filter ?? {}),
          ...(startKey ? { ExclusiveStartKey: startKey } : {}),
        })
      );
      total += result.Count ?? 0;
      startKey = result.LastEvaluatedKey;
    } while (startKey);

    return total;
  }

  /**
   * Writes the record with attribute_not_exists on its key, so an existing
   * record is never overwritten.
   */
  async insertOne<C extends CollectionName>(collection: C, record: Collections[C]): Promise<string> {
    const key = recordKey(collection, record);
    try {
      await this.client.send(
        new PutCommand({
          TableName: this.tableName(collection),
          Item: record,
          ConditionExpression: 'attribute_not_exists(#pk)',
          ExpressionAttributeNames: { '#pk': KEY_ATTRIBUTES[collection] },
        })
      );
      return key;
    } catch (err) {
      if (err instanceof ConditionalCheckFailedException) {
        throw new ConditionFailedError();
      }
      throw err;
    }
  }

  async replaceOne<C extends CollectionName>(collection: C, record: Collections[C]): Promise<void> {
    recordKey(collection, record);
    await this.client.send(
      new PutCommand({
        TableName: this.tableName(collection),
        Item: record,
      })
    );
  }

  async updateOne<C extends CollectionName>(
    collection: C,
    key: string,
    update: Update<Collections[C]>,
  ): Promise<boolean> {
    try {
      await this.client.send(
        new UpdateCommand({
          TableName: this.tableName(collection),
          Key: { [KEY_ATTRIBUTES[collection]]: key },
          ...buildUpdateExpression(KEY_ATTRIBUTES[collection], update),
        })
      );
      return true;
    } catch (err) {
      if (err instanceof ConditionalCheckFailedException) {
        return false;
      }
      throw err;
    }
  }

  async deleteOne<C extends CollectionName>(collection: C, key: string): Promise<boolean> {
    try {
      await this.client.send(
        new DeleteCommand({
          TableName: this.tableName(collection),
          Key: { [KEY_ATTRIBUTES[collection]]: key },
          ConditionExpression: 'attribute_exists(#pk)',
          ExpressionAttributeNames: { '#pk': KEY_ATTRIBUTES[collection] },
        })
      );
      return true;
    } catch (err) {
      if (err instanceof ConditionalCheckFailedException) {
        return false;
      }
      throw err;
    }
  }

  async transact(operations: WriteOperation[]): Promise<void> {
    if (operations.length === 0) return;
    if (operations.length > MAX_TRANSACTION_OPERATIONS) {
      throw new Error(
        `Transaction has ${operations.length} operations; the limit is ${MAX_TRANSACTION_OPERATIONS}`
      );
    }

    const transactItems: NonNullable<TransactWriteCommandInput['TransactItems']> = operations.map(op => {
      const keyAttribute = KEY_ATTRIBUTES[op.collection];
      if (op.kind === 'insert') {
        return {
          Put: {
            TableName: this.tableName(op.collection),
            Item: op.record,
            ConditionExpression: 'attribute_not_exists(#pk)',
            ExpressionAttributeNames: { '#pk': keyAttribute },
          },
        };
      }
      if (op.kind === 'delete') {
        return {
          Delete: {
            TableName: this.tableName(op.collection),
            Key: { [keyAttribute]: op.key },
          },
        };
      }
      return {
        Update: {
          TableName: this.tableName(op.collection),
          Key: { [keyAttribute]: op.key },
          ...buildUpdateExpression(keyAttribute, op.update),
        },
      };
    });

    try {
      await this.client.send(new TransactWriteCommand({ TransactItems: transactItems }));
    } catch (err) {
      if (err instanceof TransactionCanceledException) {
        const failed = (err.CancellationReasons ?? []).findIndex(
          reason => reason.Code === 'ConditionalCheckFailed'
        );
        if (failed >= 0) {
          throw new ConditionFailedError(failed);
        }
      }
      throw err;
    }
  }
}

export function createDocumentStore(config: AppConfig): DynamoDocumentStore {
  return new DynamoDocumentStore(createDocumentClient(config), config.tablePrefix);
}
