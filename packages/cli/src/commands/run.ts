import { Command } from 'commander';
import { TraceLogger } from '@wmreg/core';
import { generateId } from '@wmreg/shared';
import { setupBank, handleError } from '../setup.js';
import { loadScenario, runScenario, type ScenarioTrace } from '../scenario.js';
import { formatTickReport, formatTrace } from '../output/formatter.js';

interface RunOptions {
  config?: string;
  json?: boolean;
  trace?: boolean;
}

export const runCommand = new Command('run')
  .description('Replay a scenario of ticks through the configured stores')
  .argument('<scenario>', 'Path to a YAML or JSON scenario file')
  .option('-c, --config <path>', 'Path to a config file')
  .option('--json', 'Output as JSON')
  .option('--trace', 'Show the execution trace')
  .action(async (scenarioPath: string, options: RunOptions) => {
    try {
      const { config, bank } = await setupBank(options.config);
      const scenario = await loadScenario(scenarioPath);

      let trace: ScenarioTrace | undefined;
      if (options.trace || config.logging.trace || config.logging.level === 'debug') {
        const logger = new TraceLogger();
        const traceId = generateId('trace');
        logger.createTrace(traceId, scenarioPath);
        bank.setTracer(logger.bind(traceId));
        trace = { logger, traceId };
      }

      const reports = runScenario(bank, scenario, trace);

      if (options.json) {
        console.log(JSON.stringify(reports, null, 2));
      } else if (config.logging.level !== 'warn' && config.logging.level !== 'error') {
        for (const report of reports) {
          console.log(formatTickReport(report));
        }
      }

      if (trace) {
        console.log('\n--- Trace ---');
        console.log(formatTrace(trace.logger.getTrace(trace.traceId)));
      }
    } catch (err) {
      handleError(err);
    }
  });
