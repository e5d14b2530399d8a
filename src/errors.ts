// Define error codes as an enum for type safety
export enum ErrorCode {
  INVALID_QUANTITY = 'invalid-quantity',
  OUT_OF_STOCK = 'out-of-stock',
  EMPTY_CART = 'empty-cart',
  NOT_FOUND = 'not-found',
  PERSISTENCE_ERROR = 'persistence-error',
  INVALID_VISIT_DATE = 'invalid-visit-date',
  INVALID_CREDENTIALS = 'invalid-credentials',
  EMAIL_TAKEN = 'email-taken',
  VALIDATION_FAILED = 'validation-failed',
  INVALID_STATUS_TRANSITION = 'invalid-status-transition',
  REFUND_DENIED = 'refund-denied',
}

// Base error for every failure a menu shows to the user
export class BaseError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

export class InvalidQuantityError extends BaseError {
  constructor(quantity: number) {
    super(ErrorCode.INVALID_QUANTITY, `Quantity must be a positive integer (got ${quantity})`);
  }
}

export class OutOfStockError extends BaseError {
  constructor(
    public readonly referenceId: string,
    public readonly requested: number,
    public readonly available: number,
  ) {
    super(
      ErrorCode.OUT_OF_STOCK,
      `Only ${available} left for ${referenceId}; ${requested} requested`,
    );
  }
}

export class EmptyCartError extends BaseError {
  constructor() {
    super(ErrorCode.EMPTY_CART, 'Cart is empty');
  }
}

export class NotFoundError extends BaseError {
  constructor(what: string, id: string) {
    super(ErrorCode.NOT_FOUND, `${what} ${id} not found`);
  }
}

export class PersistenceError extends BaseError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.PERSISTENCE_ERROR, message, { cause });
  }
}

export class InvalidVisitDateError extends BaseError {
  constructor(visitDate: string) {
    super(ErrorCode.INVALID_VISIT_DATE, `Visit date must be a YYYY-MM-DD date after today (got "${visitDate}")`);
  }
}

export class InvalidCredentialsError extends BaseError {
  constructor() {
    super(ErrorCode.INVALID_CREDENTIALS, 'Invalid email or password');
  }
}

export class EmailTakenError extends BaseError {
  constructor(email: string) {
    super(ErrorCode.EMAIL_TAKEN, `An account already uses ${email}`);
  }
}

export class ValidationError extends BaseError {
  constructor(message: string) {
    super(ErrorCode.VALIDATION_FAILED, message);
  }
}

export class InvalidStatusTransitionError extends BaseError {
  constructor(ticketId: string, from: string, to: string) {
    super(ErrorCode.INVALID_STATUS_TRANSITION, `Ticket ${ticketId} is ${from} and cannot become ${to}`);
  }
}

export class NotReschedulableError extends BaseError {
  constructor(ticketId: string, status: string) {
    super(ErrorCode.INVALID_STATUS_TRANSITION, `Ticket ${ticketId} is ${status} and cannot be rescheduled`);
  }
}

export class RefundDeniedError extends BaseError {
  constructor(cutoffHours: number) {
    super(ErrorCode.REFUND_DENIED, `Refunds close ${cutoffHours} hours before the visit date`);
  }
}

/**
 * Runs a store call; domain errors pass through, anything else becomes a
 * PersistenceError naming the operation.
 */
export async function persisting<T>(operation: string, work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (err) {
    if (err instanceof BaseError) throw err;
    throw new PersistenceError(`Could not ${operation}`, err);
  }
}
