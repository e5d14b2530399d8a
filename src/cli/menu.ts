import { BaseError } from '../errors';
import { describeError, type Logger } from '../logger';
import { InputClosedError, type Terminal } from './terminal';

export interface MenuOption<C extends string> {
  command: C;
  label: string;
}

export type Handlers<C extends string> = Record<C, () => Promise<void>>;

export interface Menu<C extends string> {
  title: string;
  options: MenuOption<C>[];
  handlers: Handlers<C>;
  /** Runs its handler, then leaves the menu. */
  exit: C;
}

export function isCommand<C extends string>(options: MenuOption<C>[], input: string): input is C {
  return options.some(option => option.command === input);
}

/**
 * Prints a domain failure as-is; anything else is logged and reported
 * without detail. End of input always propagates.
 */
export function reportError(terminal: Terminal, log: Logger, err: unknown): void {
  if (err instanceof InputClosedError) throw err;
  if (err instanceof BaseError) {
    terminal.print(`Error: ${err.message}`);
    return;
  }
  log({ level: 'error', action: 'cli.error', error: describeError(err) });
  terminal.print('Something went wrong. Please try again.');
}

export async function runMenu<C extends string>(terminal: Terminal, log: Logger, menu: Menu<C>): Promise<void> {
  for (;;) {
    terminal.print();
    terminal.print(`--- ${menu.title} ---`);
    for (const option of menu.options) {
      terminal.print(`${option.command}. ${option.label}`);
    }

    const choice = (await terminal.ask('Choice: ')).trim();
    if (!isCommand(menu.options, choice)) {
      terminal.print('Invalid choice.');
      continue;
    }

    try {
      await menu.handlers[choice]();
    } catch (err) {
      reportError(terminal, log, err);
    }
    if (choice === menu.exit) return;
  }
}

export async function askInteger(terminal: Terminal, question: string): Promise<number | null> {
  const answer = (await terminal.ask(question)).trim();
  return /^-?\d+$/.test(answer) ? Number(answer) : null;
}

export async function confirm(terminal: Terminal, question: string): Promise<boolean> {
  return (await terminal.ask(question)).trim().toLowerCase() === 'y';
}

/** Numbered pick from a list; null on "0", bad input or an empty list. */
export async function choose<T>(
  terminal: Terminal,
  heading: string,
  items: T[],
  describe: (item: T) => string,
): Promise<T | null> {
  if (items.length === 0) {
    terminal.print(`No ${heading.toLowerCase()} available.`);
    return null;
  }
  terminal.print();
  terminal.print(`${heading}:`);
  items.forEach((item, index) => terminal.print(`${index + 1}. ${describe(item)}`));
  terminal.print('0. Back');

  const index = await askInteger(terminal, 'Select (number, 0 to go back): ');
  if (index === 0) return null;
  const item = index === null ? undefined : items[index - 1];
  if (item === undefined) {
    terminal.print('Invalid selection.');
    return null;
  }
  return item;
}
