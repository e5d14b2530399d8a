export type ItemKind = 'TICKET' | 'MERCHANDISE';

export interface CatalogRef {
  kind: ItemKind;
  referenceId: string; // parkId for TICKET, sku for MERCHANDISE
}

export interface CatalogEntry extends CatalogRef {
  name: string;
  price: number; // USD cents, integer >= 0
  stock: number; // integer >= 0
}

export interface Park {
  parkId: string;     // P01, P02, ...
  name: string;
  location: string;
  description: string;
  price: number;      // ticket price, cents
  stock: number;      // tickets left to sell
  createdAt: string;  // ISO 8601 timestamp
}

export interface Merchandise {
  sku: string;        // SKU001, SKU002, ...
  name: string;
  price: number;      // cents
  stock: number;
  createdAt: string;
}

export interface CartItem {
  lineId: string;     // derived from kind, referenceId and visitDate
  kind: ItemKind;
  referenceId: string;
  name: string;
  unitPrice: number;  // cents, snapshot taken when the line was added
  quantity: number;   // integer >= 1
  visitDate?: string | undefined; // YYYY-MM-DD, ticket lines only
}

export interface Cart {
  customerId: string;
  items: CartItem[];
}

export interface SavedCart extends Cart {
  updatedAt: string;
}

export interface OrderItem extends CartItem {
  lineTotal: number; // unitPrice * quantity
}

export interface Order {
  orderId: string;    // UUID, generated at checkout
  customerId: string;
  items: OrderItem[];
  total: number;      // sum of lineTotals, cents
  status: 'CONFIRMED';
  createdAt: string;
}

export type TicketStatus = 'ISSUED' | 'USED' | 'REFUNDED' | 'CANCELLED';

export interface Ticket {
  ticketId: string;   // UUID, rendered as the QR payload
  orderId: string;
  customerId: string;
  parkId: string;
  parkName: string;
  visitDate: string;  // YYYY-MM-DD
  admits: number;     // visitors admitted by this ticket
  unitPrice: number;  // cents per visitor
  status: TicketStatus;
  createdAt: string;
  updatedAt: string;
}

export type Role = 'CUSTOMER' | 'ADMIN';

export type AgeGroup = '<18' | '18-24' | '25-34' | '35-44' | '45-54' | '55+';
export type Gender = 'Male' | 'Female';
export type VisitorType = 'local' | 'domestic' | 'tourist';

/** Optional visitor details used by the demographic reports. */
export interface Profile {
  ageGroup?: AgeGroup | undefined;
  gender?: Gender | undefined;
  region?: string | undefined;
  visitorType?: VisitorType | undefined;
  marketingOptIn?: boolean | undefined;
}

export interface User extends Profile {
  userId: string;     // cust01, admin01, ...
  name: string;
  email: string;
  passwordHash: string; // <salt>:<scrypt hash>, hex
  role: Role;
  createdAt: string;
}

export type SupportStatus = 'OPEN' | 'RESOLVED';

export interface SupportTicket {
  supportTicketId: string;
  customerId: string;
  description: string;
  status: SupportStatus;
  resolution: string;
  createdAt: string;
  resolvedAt?: string | undefined;
}

export type AuditCategory = 'USER' | 'ORDER' | 'BOOKING' | 'CATALOG' | 'SUPPORT';

export interface AuditEntry {
  entryId: string;
  timestamp: string;
  category: AuditCategory;
  actor: string;
  action: string;
}

export interface CheckoutResult {
  order: Order;
  tickets: Ticket[];
  cart: Cart; // the emptied cart
}
