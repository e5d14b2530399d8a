import { randomUUID } from 'crypto';
import { AccountService } from './accounts';
import { AuditLog } from './audit';
import { CartStore } from './cart-store';
import { CatalogService } from './catalog';
import { CheckoutEngine } from './checkout';
import type { AppConfig } from './config';
import type { Logger } from './logger';
import type { DocumentStore } from './repository';
import { SupportDesk } from './support';
import { TicketService } from './tickets';
import { plainRenderer, qrRenderer, type CodeRenderer } from './cli/qr';

export interface Services {
  store: DocumentStore;
  log: Logger;
  audit: AuditLog;
  accounts: AccountService;
  catalog: CatalogService;
  checkout: CheckoutEngine;
  carts: CartStore;
  tickets: TicketService;
  support: SupportDesk;
  renderCode: CodeRenderer;
}

export interface ServiceOptions {
  now?: () => Date;
  newId?: () => string;
}

export function createServices(
  store: DocumentStore,
  config: Pick<AppConfig, 'qrCodes' | 'refundCutoffHours'>,
  log: Logger,
  options: ServiceOptions = {},
): Services {
  const now = options.now ?? (() => new Date());
  const newId = options.newId ?? randomUUID;
  const audit = new AuditLog(store, { now, newId, log });

  return {
    store,
    log,
    audit,
    accounts: new AccountService(store, audit, now),
    catalog: new CatalogService(store, audit, now),
    checkout: new CheckoutEngine({ store, audit, log, now, newId }),
    carts: new CartStore(store, now),
    tickets: new TicketService(store, audit, { refundCutoffHours: config.refundCutoffHours, now, log }),
    support: new SupportDesk(store, audit, now, options.newId),
    renderCode: config.qrCodes ? qrRenderer(log) : plainRenderer,
  };
}
