#!/usr/bin/env node
import 'dotenv/config';
import { dispatch } from './commands.js';
import { componentLogger } from './utils/logger.js';

async function main(): Promise<void> {
  const log = componentLogger('cli');
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    log.warn({ signal }, 'abort requested; terminating running jobs');
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  const result = await dispatch(process.argv.slice(2), {
    env: process.env,
    cwd: process.cwd(),
    signal: controller.signal
  });
  if (result.stdout) process.stdout.write(result.stdout);
  if (result.stderr) process.stderr.write(result.stderr);
  process.exitCode = result.exitCode;
}

main().catch((error) => {
  const detail = error instanceof Error ? error.stack ?? error.message : String(error);
  console.error(
    JSON.stringify({ ts: new Date().toISOString(), level: 'error', msg: 'allpair.failed', detail })
  );
  process.exit(1);
});
