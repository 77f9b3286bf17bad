/**
 * Start command -- run the engine, health monitor and gateway until
 * SIGINT or SIGTERM.
 */

import { loadConfig } from '../config.js';
import { Runtime } from '../runtime.js';
import { flagValue } from '../args.js';

// ---------------------------------------------------------------------------
// ANSI color helpers
// ---------------------------------------------------------------------------

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const CYAN = '\x1b[36m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';

// ---------------------------------------------------------------------------
// CLI entry point
// ---------------------------------------------------------------------------

export async function start(args: string[]): Promise<void> {
  let config;
  try {
    config = loadConfig({ configPath: flagValue(args, '--config') });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`\n  ${RED}Failed to load config:${RESET} ${message}\n`);
    process.exitCode = 1;
    return;
  }

  const runtime = new Runtime(config);
  let result;
  try {
    result = await runtime.start();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`\n  ${RED}Failed to start:${RESET} ${message}\n`);
    await runtime.stop();
    process.exitCode = 1;
    return;
  }

  const { recovery, address } = result;
  const relay = config.relay.mode === 'memory' ? `${YELLOW}in-memory${RESET}` : config.relay.controlUrl;

  console.log(`\n  ${CYAN}${BOLD}bandshare${RESET}`);
  console.log(`  ${DIM}${'='.repeat(50)}${RESET}\n`);
  console.log(`  ${BOLD}Gateway${RESET}       ${address ? `${address.host}:${address.port}` : `${DIM}not bound${RESET}`}`);
  console.log(`  ${BOLD}Relay${RESET}         ${relay}${config.relay.process ? ` ${DIM}(supervised)${RESET}` : ''}`);
  console.log(`  ${BOLD}Sharers${RESET}       ${runtime.engine.ledger.list().length}`);
  console.log(`  ${BOLD}Persistence${RESET}   ${config.persistence.enabled ? config.persistence.dbPath : `${DIM}disabled${RESET}`}`);
  if (recovery) {
    console.log(
      `  ${BOLD}Recovered${RESET}     ${GREEN}${recovery.restored}${RESET} connections` +
        ` ${DIM}(${recovery.reregistered} re-registered, ${recovery.failed} failed)${RESET}`,
    );
  }
  console.log(`\n  ${DIM}Press Ctrl+C to stop.${RESET}\n`);

  const signal = await new Promise<NodeJS.Signals>((resolve) => {
    process.once('SIGINT', resolve);
    process.once('SIGTERM', resolve);
  });

  console.log(`\n  ${DIM}Received ${signal}, shutting down...${RESET}`);
  await runtime.stop();
  console.log(`  ${GREEN}Stopped.${RESET}\n`);
}
