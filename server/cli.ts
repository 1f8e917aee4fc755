import 'dotenv/config';
import { createSessionFactory } from './browser/sessionPool';
import { CLI_USAGE, CliUsageError, applyCliArgs, parseCliArgs, type CliArgs } from './cliArgs';
import { loadConfig } from './config/config';
import { errorMessage } from './enrichment/errors';
import { createLogger } from './obs/logger';
import { createFsArtifactStore } from './persistence/fsStore';
import { runWorkflow, workflowExitCode } from './pipeline/runWorkflow';
import { createRestSink } from './storage/restSink';

const parseOrReport = (argv: string[]): CliArgs | null => {
  try {
    return parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(error.message);
      console.error(CLI_USAGE);
      return null;
    }
    throw error;
  }
};

const main = async (argv: string[]): Promise<number> => {
  const args = parseOrReport(argv);
  if (!args) {
    return 2;
  }

  if (args.help) {
    console.log(CLI_USAGE);
    return 0;
  }

  const config = applyCliArgs(loadConfig(), args);
  const logger = createLogger(config);
  const sessions = createSessionFactory(config, logger);
  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupted; finishing in-flight articles');
    controller.abort();
  });

  try {
    const report = await runWorkflow(
      {
        config,
        logger,
        store: createFsArtifactStore(config),
        sessions,
        sink: createRestSink(config, logger),
      },
      { categories: config.feeds.categories, skip: args.skip, signal: controller.signal },
    );
    console.log(JSON.stringify(report, null, 2));
    return workflowExitCode(report);
  } finally {
    await sessions.shutdown();
  }
};

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(JSON.stringify({ level: 'error', message: 'Workflow crashed', error: errorMessage(error) }));
    process.exitCode = 1;
  },
);
