import { Command } from 'commander';
import ora from 'ora';
import { GraphDefinitionSchema } from '@graphrun/schemas';
import { errorMessage } from '@graphrun/shared';
import { createServiceClient } from '../utils/api.js';
import { readJsonFile } from '../utils/files.js';
import { output, outputTable, success, error, formatDate, truncate } from '../utils/output.js';
import type { OutputFormat } from '../utils/output.js';

export function createGraphCommand(): Command {
  const graph = new Command('graph')
    .description('Manage graphs');

  // List graphs
  graph
    .command('list')
    .alias('ls')
    .description('List stored graphs')
    .option('-f, --format <format>', 'Output format (json|table)', 'table')
    .action(async (options: { format: OutputFormat }) => {
      const spinner = ora('Loading graphs...').start();

      try {
        const data = await createServiceClient().listGraphs();

        spinner.stop();

        if (options.format === 'json') {
          output(data.graphs, 'json');
          return;
        }
        if (data.graphs.length === 0) {
          console.log('No graphs found');
          return;
        }

        outputTable(
          ['ID', 'Name', 'Nodes', 'Created'],
          data.graphs.map(g => [
            g.graph_id,
            truncate(g.name, 30),
            String(g.node_count),
            formatDate(g.created_at),
          ])
        );
      } catch (err) {
        spinner.stop();
        error(`Failed to list graphs: ${errorMessage(err)}`);
        process.exit(1);
      }
    });

  // Get graph definition
  graph
    .command('get <id>')
    .description('Get a graph definition')
    .action(async (id: string) => {
      const spinner = ora('Loading graph...').start();

      try {
        const data = await createServiceClient().getGraph(id);

        spinner.stop();
        output(data, 'json');
      } catch (err) {
        spinner.stop();
        error(`Failed to get graph: ${errorMessage(err)}`);
        process.exit(1);
      }
    });

  // Create graph
  graph
    .command('create <file>')
    .description('Create a graph from a JSON definition file')
    .action(async (file: string) => {
      let definition: unknown;
      try {
        definition = readJsonFile(file);
      } catch (err) {
        error(errorMessage(err));
        process.exit(1);
      }

      const parsed = GraphDefinitionSchema.safeParse(definition);
      if (!parsed.success) {
        error('Invalid graph definition:');
        parsed.error.issues.forEach((issue) => {
          console.error(`  ${issue.path.join('.') || '(root)'}: ${issue.message}`);
        });
        process.exit(1);
      }

      const spinner = ora('Creating graph...').start();

      try {
        const data = await createServiceClient().createGraph(definition);

        spinner.stop();
        success(`${data.message}: ${data.graph_id}`);
      } catch (err) {
        spinner.stop();
        error(`Failed to create graph: ${errorMessage(err)}`);
        process.exit(1);
      }
    });

  return graph;
}
