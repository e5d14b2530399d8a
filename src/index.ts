#!/usr/bin/env node
import { ConfigError, loadConfig, type AppConfig, type Env } from './config';
import { runApp } from './cli/main-menu';
import { createTerminal } from './cli/terminal';
import { createLogger, describeError } from './logger';
import { createDocumentStore } from './repository';
import { seedInitialData } from './seed';
import { createServices } from './services';

function readConfig(env: Env): AppConfig | null {
  try {
    return loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      return null;
    }
    throw err;
  }
}

export async function main(env: Env = process.env): Promise<number> {
  const config = readConfig(env);
  if (!config) return 1;

  const log = createLogger(config.logLevel);
  const store = createDocumentStore(config);
  const terminal = createTerminal();

  try {
    if (await seedInitialData(store)) {
      log({ level: 'info', action: 'seed.complete' });
    }
    await runApp(createServices(store, config, log), terminal);
    return 0;
  } catch (err) {
    log({ level: 'error', action: 'app.fatal', error: describeError(err) });
    console.error(`Fatal: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  } finally {
    terminal.close();
    store.destroy();
  }
}

if (require.main === module) {
  main().then(
    code => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(describeError(err));
      process.exitCode = 1;
    },
  );
}
