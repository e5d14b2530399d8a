import type { Services } from '../services';
import type { User } from '../types';
import { runAdminConsole } from './admin';
import { runCustomerConsole } from './customer';
import { runMenu, type MenuOption } from './menu';
import { InputClosedError, type Terminal } from './terminal';

export enum MainCommand {
  Login = '1',
  Register = '2',
  Exit = '0',
}

const MAIN_OPTIONS: MenuOption<MainCommand>[] = [
  { command: MainCommand.Login, label: 'Login' },
  { command: MainCommand.Register, label: 'Register' },
  { command: MainCommand.Exit, label: 'Exit' },
];

function openConsole(services: Services, terminal: Terminal, user: User): Promise<void> {
  return user.role === 'ADMIN'
    ? runAdminConsole(services, terminal, user)
    : runCustomerConsole(services, terminal, user);
}

/** Runs until Exit or end of input. */
export async function runApp(services: Services, terminal: Terminal): Promise<void> {
  terminal.print('=== Park Booking Desk ===');

  try {
    await runMenu(terminal, services.log, {
      title: 'Main Menu',
      options: MAIN_OPTIONS,
      exit: MainCommand.Exit,
      handlers: {
        [MainCommand.Login]: async () => {
          const email = await terminal.ask('Email: ');
          const password = await terminal.ask('Password: ');
          const user = await services.accounts.login(email, password);
          terminal.print(`Welcome, ${user.name}!`);
          await openConsole(services, terminal, user);
        },

        [MainCommand.Register]: async () => {
          const name = await terminal.ask('Name: ');
          const email = await terminal.ask('Email: ');
          const password = await terminal.ask('Password: ');
          const user = await services.accounts.register(name, email, password);
          terminal.print(`Registered ${user.email} as ${user.userId}. You can now log in.`);
        },

        [MainCommand.Exit]: async () => undefined,
      },
    });
  } catch (err) {
    if (!(err instanceof InputClosedError)) throw err;
  }
  terminal.print('Goodbye.');
}
