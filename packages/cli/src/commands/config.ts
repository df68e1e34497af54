import { Command } from 'commander';
import { ConfigManager } from '@wmreg/core';
import { CONFIG_FILE_NAMES } from '@wmreg/shared';
import { handleError } from '../setup.js';

export const configCommand = new Command('config')
  .description('Inspect wmreg configuration');

configCommand
  .command('show')
  .description('Show the resolved configuration')
  .option('-c, --config <path>', 'Path to a config file')
  .action(async (options: { config?: string }) => {
    try {
      const mgr = new ConfigManager();
      const config = await mgr.load({ configPath: options.config });
      console.log(`# source: ${mgr.getSource() ?? 'defaults'}`);
      console.log(JSON.stringify(config, null, 2));
    } catch (err) {
      handleError(err);
    }
  });

configCommand
  .command('path')
  .description('Show config file search paths')
  .action(() => {
    console.log('Config files searched in the working directory and its parents (first found wins):');
    CONFIG_FILE_NAMES.forEach((name, i) => console.log(`  ${i + 1}. ./${name}`));
    console.log('');
    console.log('Environment variables:');
    console.log('  WMREG_LOG_LEVEL');
    console.log('  WMREG_TRACE');
  });
