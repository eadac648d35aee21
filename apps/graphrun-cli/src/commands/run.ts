import { Command } from 'commander';
import ora from 'ora';
import { errorMessage } from '@graphrun/shared';
import type { RunState } from '@graphrun/shared';
import { createServiceClient } from '../utils/api.js';
import { readStateFile } from '../utils/files.js';
import {
  output,
  outputTable,
  success,
  error,
  info,
  formatStatus,
  formatStreamMessage,
  logRows,
} from '../utils/output.js';
import type { OutputFormat } from '../utils/output.js';

interface ExecOptions {
  state?: string;
  background?: boolean;
  watch?: boolean;
  format: OutputFormat;
}

async function watchRun(graphId: string, initialState: RunState): Promise<void> {
  let failed = false;

  await createServiceClient().streamRun(graphId, initialState, (message) => {
    if (message.type === 'error' || (message.type === 'complete' && message.status === 'failed')) {
      failed = true;
    }
    console.log(formatStreamMessage(message));
  });

  if (failed) {
    process.exit(1);
  }
}

export function createRunCommand(): Command {
  const run = new Command('run')
    .description('Execute graphs and inspect runs');

  // Execute graph
  run
    .command('exec <graphId>')
    .alias('execute')
    .description('Run a graph')
    .option('-s, --state <file>', 'Initial state JSON file')
    .option('-b, --background', 'Run in the background and return the run id')
    .option('-w, --watch', 'Stream events while the graph runs')
    .option('-f, --format <format>', 'Output format (json|table)', 'table')
    .action(async (graphId: string, options: ExecOptions) => {
      let initialState: RunState;
      try {
        initialState = readStateFile(options.state);
      } catch (err) {
        error(errorMessage(err));
        process.exit(1);
      }

      if (options.watch) {
        info(`Streaming run of graph ${graphId}...`);
        try {
          await watchRun(graphId, initialState);
        } catch (err) {
          error(`Stream failed: ${errorMessage(err)}`);
          process.exit(1);
        }
        return;
      }

      const client = createServiceClient();

      if (options.background) {
        const spinner = ora('Starting background run...').start();
        try {
          const data = await client.runInBackground(graphId, initialState);

          spinner.stop();
          success(`Background run started: ${data.run_id}`);
          info(`Poll with: graphrun run status ${data.run_id}`);
        } catch (err) {
          spinner.stop();
          error(`Failed to start run: ${errorMessage(err)}`);
          process.exit(1);
        }
        return;
      }

      const spinner = ora('Running graph...').start();
      try {
        const data = await client.runGraph(graphId, initialState);

        spinner.stop();

        if (options.format === 'json') {
          output(data, 'json');
          return;
        }

        success(`Run ${data.run_id} ${formatStatus(data.status)}`);
        outputTable(['Node', 'Status', 'Time', 'Details'], logRows(data.execution_log));
        output(data.final_state, 'json');
      } catch (err) {
        spinner.stop();
        error(`Run failed: ${errorMessage(err)}`);
        process.exit(1);
      }
    });

  // Run state
  run
    .command('state <runId>')
    .description('Show the state and log of a run')
    .option('-f, --format <format>', 'Output format (json|table)', 'table')
    .action(async (runId: string, options: { format: OutputFormat }) => {
      const spinner = ora('Loading run...').start();

      try {
        const data = await createServiceClient().getState(runId);

        spinner.stop();

        if (options.format === 'json') {
          output(data, 'json');
          return;
        }

        console.log(`Run ${data.run_id} of graph ${data.graph_id}: ${formatStatus(data.status)}`);
        if (data.current_node) {
          console.log(`Current node: ${data.current_node}`);
        }
        if (data.error) {
          error(data.error);
        }
        outputTable(['Node', 'Status', 'Time', 'Details'], logRows(data.execution_log));
        output(data.state, 'json');
      } catch (err) {
        spinner.stop();
        error(`Failed to get run: ${errorMessage(err)}`);
        process.exit(1);
      }
    });

  // Background status
  run
    .command('status <runId>')
    .description('Show the status of a background run')
    .action(async (runId: string) => {
      try {
        const data = await createServiceClient().getBackgroundStatus(runId);

        console.log(`Task: ${formatStatus(data.task_status)}`);
        if (data.workflow_status) {
          console.log(`Run: ${formatStatus(data.workflow_status)}`);
        }
        if (data.current_node) {
          console.log(`Current node: ${data.current_node}`);
        }
        if (data.error) {
          error(data.error);
        }
      } catch (err) {
        error(`Failed to get status: ${errorMessage(err)}`);
        process.exit(1);
      }
    });

  // Cancel run
  run
    .command('cancel <runId>')
    .description('Cancel an active run')
    .action(async (runId: string) => {
      const spinner = ora('Cancelling run...').start();

      try {
        const data = await createServiceClient().cancelRun(runId);

        spinner.stop();
        success(`Run ${data.run_id}: ${formatStatus(data.status)}`);
      } catch (err) {
        spinner.stop();
        error(`Failed to cancel run: ${errorMessage(err)}`);
        process.exit(1);
      }
    });

  return run;
}
