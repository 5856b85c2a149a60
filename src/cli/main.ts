#!/usr/bin/env node

/**
 * waypoint CLI entry point.
 * Thin wrapper — all logic delegated to core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import {
  registerAskCommand,
  registerDemoCommand,
  registerCapabilitiesCommand,
} from './ask.js';

const program = new Command();

program
  .name('waypoint')
  .description(
    'Answer questions by planning them into steps, routing each step to a search, retrieve or analyze capability, and combining the results.',
  )
  .version('0.1.0');

registerAskCommand(program);
registerDemoCommand(program);
registerCapabilitiesCommand(program);

await program.parseAsync();
