#!/usr/bin/env node

/**
 * tabrace CLI entry point.
 * All logic lives in the browser and core modules.
 */

import 'dotenv/config';
import { Command } from 'commander';

import {
  registerOpenCommand,
  registerRaceCommand,
  registerWatchCommand,
} from './run.js';

const program = new Command();

program
  .name('tabrace')
  .description(
    'Drive a Chromium page with cancellable, raceable actions: navigate, wait, race and watch.',
  )
  .version('0.1.0');

registerOpenCommand(program);
registerRaceCommand(program);
registerWatchCommand(program);

await program.parseAsync();
