#!/usr/bin/env tsx

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { errorMessage } from '@graphrun/shared';
import { createGraphCommand } from './commands/graph.js';
import { createRunCommand } from './commands/run.js';
import { createToolsCommand } from './commands/tools.js';
import { createConfigCommand } from './commands/config.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read package.json for version
const packageJsonPath = join(__dirname, '../package.json');
const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));

const program = new Command();

program
  .name('graphrun')
  .description('Create, run and watch graph workflows')
  .version(packageJson.version);

// Register commands
program.addCommand(createGraphCommand());
program.addCommand(createRunCommand());
program.addCommand(createToolsCommand());
program.addCommand(createConfigCommand());

// Add global error handler
process.on('unhandledRejection', (reason: unknown) => {
  console.error('Error:', errorMessage(reason));
  process.exit(1);
});

// Show help if no command provided
if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  program.parseAsync(process.argv).catch((err: unknown) => {
    console.error('Error:', errorMessage(err));
    process.exit(1);
  });
}
