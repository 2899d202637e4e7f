#!/usr/bin/env node

/**
 * webshots CLI entry point.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerRunCommand, registerStatusCommand } from './run.js';

const program = new Command();

program
  .name('webshots')
  .description(
    'Visit every collection page of a web archive GUI in a supervised browser worker, recording screenshots and load times.',
  )
  .version('0.1.0');

registerRunCommand(program);
registerStatusCommand(program);

await program.parseAsync();
