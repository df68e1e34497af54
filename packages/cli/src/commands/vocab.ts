import { Command } from 'commander';
import { setupBank, handleError } from '../setup.js';
import { formatVocabulary } from '../output/formatter.js';

export const vocabCommand = new Command('vocab')
  .description('List the commands, no-ops and flags of every configured store')
  .option('-c, --config <path>', 'Path to a config file')
  .option('--json', 'Output as JSON')
  .action(async (options: { config?: string; json?: boolean }) => {
    try {
      const { bank } = await setupBank(options.config);
      const vocabulary = bank.vocabulary();
      console.log(options.json ? JSON.stringify(vocabulary, null, 2) : formatVocabulary(vocabulary));
    } catch (err) {
      handleError(err);
    }
  });
