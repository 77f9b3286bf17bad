#!/usr/bin/env tsx
/**
 * bandshare CLI entry point.
 *
 *   bandshare start [--config <path>]
 *   bandshare status [--client <id> | --sharer <id>] [--json] [--config <path>]
 *   bandshare help
 *   bandshare version
 */

import { start } from './commands/start.js';
import { status } from './commands/status.js';

export const VERSION = '0.1.0';

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const CYAN = '\x1b[36m';
const RED = '\x1b[31m';

function help(): void {
  console.log(`\n  ${CYAN}${BOLD}bandshare${RESET} ${DIM}v${VERSION}${RESET}\n`);
  console.log(`  ${BOLD}Usage${RESET}  bandshare <command> [options]\n`);
  console.log(`  ${BOLD}start${RESET}     Run the orchestrator, health monitor and gateway`);
  console.log(`  ${BOLD}status${RESET}    Query a running gateway (--client <id>, --sharer <id>, --json)`);
  console.log(`  ${BOLD}help${RESET}      Show this message`);
  console.log(`  ${BOLD}version${RESET}   Print the version\n`);
  console.log(`  ${DIM}All commands accept --config <path> (default ~/.bandshare/config.json).${RESET}\n`);
}

export async function main(argv: string[]): Promise<void> {
  const [command = 'help', ...args] = argv;

  switch (command) {
    case 'start':
      await start(args);
      break;
    case 'status':
      await status(args);
      break;
    case 'version':
    case '--version':
    case '-v':
      console.log(VERSION);
      break;
    case 'help':
    case '--help':
    case '-h':
      help();
      break;
    default:
      console.error(`\n  ${RED}Unknown command:${RESET} ${command}`);
      help();
      process.exitCode = 1;
  }
}

main(process.argv.slice(2)).catch((err: unknown) => {
  console.error(err instanceof Error ? err.stack ?? err.message : String(err));
  process.exitCode = 1;
});
