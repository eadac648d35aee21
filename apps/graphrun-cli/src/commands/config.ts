import { Command } from 'commander';
import { errorMessage } from '@graphrun/shared';
import { CONFIG_KEYS, getConfigManager, isConfigKey } from '../config/index.js';
import { output, success, error, info } from '../utils/output.js';

export function createConfigCommand(): Command {
  const config = new Command('config')
    .description('Manage CLI configuration');

  // Show config or one value
  config
    .command('get [key]')
    .description('Show the configuration, or one value')
    .action((key: string | undefined) => {
      const cfg = getConfigManager().get();

      if (key === undefined) {
        output(cfg, 'json');
        return;
      }
      if (!isConfigKey(key)) {
        error(`Unknown config key: ${key}`);
        console.log('Valid keys:', CONFIG_KEYS.join(', '));
        process.exit(1);
      }
      console.log(cfg[key]);
    });

  // Set config value
  config
    .command('set <key> <value>')
    .description('Set a configuration value')
    .action((key: string, value: string) => {
      if (!isConfigKey(key)) {
        error(`Unknown config key: ${key}`);
        console.log('Valid keys:', CONFIG_KEYS.join(', '));
        process.exit(1);
      }

      try {
        getConfigManager().set(key, value);
        success(`Set ${key} = ${value}`);
      } catch (err) {
        error(errorMessage(err));
        process.exit(1);
      }
    });

  // Reset config
  config
    .command('reset')
    .description('Reset configuration to defaults')
    .action(() => {
      getConfigManager().reset();
      success('Configuration reset to defaults');
    });

  // Show config path
  config
    .command('path')
    .description('Show configuration file path')
    .action(() => {
      info(`Configuration file: ${getConfigManager().getPath()}`);
    });

  return config;
}
