#!/usr/bin/env node
import { ConfigurationError, createLogger, stderrSink } from '@shiftgate/migration-engine';
import { ConfigManager, ShiftgateConfig } from './config';
import { CommandResult, configurationFailure, runCommand } from './commands';
import { renderOutput } from './output';

function emit(result: CommandResult): number {
  if (result.error) {
    console.error(result.error);
  }
  if (result.output) {
    console.log(renderOutput(result.output));
  }
  return result.exitCode;
}

async function main(): Promise<number> {
  const argv = process.argv.slice(2);

  let config: ShiftgateConfig;
  try {
    config = new ConfigManager().getConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return emit(configurationFailure(argv, error));
    }
    throw error;
  }

  const logger = createLogger('shiftgate', { minLevel: config.logLevel, sink: stderrSink });

  const controller = new AbortController();
  const onInterrupt = () => {
    logger.warn('Interrupt received; stopping at the next step boundary');
    controller.abort(new Error('interrupted'));
  };
  process.once('SIGINT', onInterrupt);

  try {
    return emit(await runCommand(argv, { config, logger, signal: controller.signal }));
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      console.error(err);
      process.exitCode = 1;
    });
}
