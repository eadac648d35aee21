import { Command } from 'commander';
import ora from 'ora';
import { errorMessage } from '@graphrun/shared';
import { createServiceClient } from '../utils/api.js';
import { output, error } from '../utils/output.js';
import type { OutputFormat } from '../utils/output.js';

export function createToolsCommand(): Command {
  return new Command('tools')
    .description('List the tools nodes can call')
    .option('-f, --format <format>', 'Output format (json|table)', 'table')
    .action(async (options: { format: OutputFormat }) => {
      const spinner = ora('Loading tools...').start();

      try {
        const data = await createServiceClient().listTools();

        spinner.stop();

        if (options.format === 'json') {
          output(data.tools, 'json');
        } else {
          data.tools.forEach((tool) => console.log(tool));
        }
      } catch (err) {
        spinner.stop();
        error(`Failed to list tools: ${errorMessage(err)}`);
        process.exit(1);
      }
    });
}
