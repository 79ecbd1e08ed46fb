#!/usr/bin/env node

import fs from 'node:fs';
import { program } from 'commander';
import { z } from 'zod';

import simulateCommand from './commands/simulate.js';

const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(fs.readFileSync(new URL('../../package.json', import.meta.url), 'utf8')));

program
  .name('boxsim')
  .description('Box-corridor navigation simulator')
  .version(packageJson.version);

program.addCommand(simulateCommand);

await program.parseAsync(process.argv);
