#!/usr/bin/env node
import { getLogger } from '@lotwise/logger';
import { Command } from 'commander';

import { registerSelectCommand } from './features/select/select.js';

const logger = getLogger('CLI');
const program = new Command();

async function main() {
  program
    .name('lotwise')
    .description('Pick the tax lots to sell for a cash target with the least capital gain')
    .version('0.1.0');

  // Select command - rank lots by gain ratio and cover the target
  registerSelectCommand(program);

  await program.parseAsync();
}

// Handle unhandled rejections
process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${String(reason)}`);
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.error(`CLI failed: ${String(error)}`);
  process.exit(1);
});
