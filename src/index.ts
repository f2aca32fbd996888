#!/usr/bin/env node
import { applyCliOverrides, loadConfig } from './config.js';
import { createCloudWatchLogsQueryClient } from './clients/cloudwatch-logs.client.js';
import { runLogWindow } from './services/log-window.service.js';
import { isLogWindowError } from './errors/log-window.error.js';
import { PRESET_WINDOWS } from './utils/duration.util.js';
import { hasFlag, parseArgs, toConfigOverrides } from './utils/cli.util.js';
import { createLogger, logger } from './utils/logger.util.js';
import { initializeCorrelationId } from './utils/runtime.util.js';

const USAGE = `
Usage: logwindow [options]

Options:
  --group <name>        CloudWatch log group (env LOG_GROUP_NAME, required)
  --window <token>      Window length: <n>m, <n>h, <n>d or <n>w (env RELATIVE_WINDOW, default 5m)
  --month <name>        Month name or 'current' (env SPECIFIC_MONTH, default current)
  --day <1-31>          Day of month or 'current' (env SPECIFIC_DAY, default current)
  --pattern <filter>    CloudWatch filter pattern (env FILTER_PATTERN)
  --region <region>     AWS region (env AWS_REGION, default us-east-1)
  --list-windows        Print the preset window tokens
  --help, -h            Show this help message

With month and day both 'current' the window ends now. Otherwise it ends at
23:59:59 UTC on the chosen date of the current year, or now if that is later.

Examples:
  logwindow --group /aws/lambda/orders --window 2h
  logwindow --group /aws/lambda/orders --window 30m --month March --day 14
`;

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2));

  if (hasFlag(parsed, 'help', 'h')) {
    console.log(USAGE);
    return 0;
  }

  if (hasFlag(parsed, 'list-windows')) {
    console.log(PRESET_WINDOWS.join(' '));
    return 0;
  }

  const correlationId = initializeCorrelationId();
  const runConfig = applyCliOverrides(loadConfig(), toConfigOverrides(parsed));
  const runLogger = createLogger({ level: runConfig.logging.level, context: { correlationId } });

  runLogger.debug('Log window fetch started', {
    logGroupName: runConfig.logs.logGroupName,
    region: runConfig.aws.region,
  });

  await runLogWindow({
    config: runConfig,
    logger: runLogger,
    client: createCloudWatchLogsQueryClient(runConfig, runLogger),
    write: (line) => console.log(line),
  });

  return 0;
}

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    if (isLogWindowError(error)) {
      console.error(`❌ ${error.message}`);
      logger.error('Log window fetch failed', error, { kind: error.kind, ...error.metadata });
      process.exit(error.exitCode);
    }
    logger.fatal('Unexpected error', error);
    console.error('❌ Unexpected error:', error);
    process.exit(1);
  });
