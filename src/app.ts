#!/usr/bin/env node
import { LIVE_EMIT_ENABLED, MODE } from 'App/config/config';
import { CliResult, USAGE, parseCliArgs } from 'App/config/cli';
import { TerminalRenderer } from 'App/render/terminalChart';
import { createStatsServer, StatsServer } from 'App/server';
import { StatClient } from 'App/services/StatClient';
import { StatMonitorState } from 'App/services/StatMonitorState';
import { StatPoller } from 'App/services/StatPoller';
import { createLogger, formatError, setLogLevel } from 'App/utils/logger';

const log = createLogger('Monitor');

const listen = (exported: StatsServer, port: number) =>
  new Promise<void>((resolve, reject) => {
    exported.server.once('error', reject);
    exported.server.listen(port, () => {
      exported.server.off('error', reject);
      resolve();
    });
  });

/**
 * Runs the monitor until a signal or until the poller gives up.
 * @returns process exit code
 */
export const main = async (argv: readonly string[]): Promise<number> => {
  let parsed: CliResult;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    console.error(formatError(err));
    console.error(USAGE);
    return 2;
  }
  if (parsed.help) {
    console.log(USAGE);
    return 0;
  }
  const { options } = parsed;
  setLogLevel(options.logLevel);

  const state = new StatMonitorState(options.windowSize);
  const client = new StatClient({
    url: options.url,
    timeoutMs: options.requestTimeoutMs,
  });

  let exported: StatsServer | undefined;
  if (options.serve) {
    exported = createStatsServer(state, {
      mode: MODE,
      liveEmitEnabled: LIVE_EMIT_ENABLED,
    });
    await listen(exported, options.port);
    log.info(`Now listening on port ${options.port}`);
  }

  const renderer = options.chart
    ? new TerminalRenderer(process.stdout, {
        height: options.chartHeight,
        colors: process.stdout.isTTY === true,
      })
    : undefined;

  const poller = new StatPoller(state, {
    intervalMs: options.intervalMs,
    maxErrors: options.maxErrors,
    fetchSnapshot: () => client.fetchSnapshot(),
    onCycle: (stats, cycle) => {
      const views = stats.views();
      // the first cycle only primes the rate counters
      if (renderer && cycle > 1) renderer.render(views);
      exported?.sockets.broadcast(views);
    },
  });

  const shutdown = (signal: string) => {
    log.info(`Caught ${signal}, shutting down`);
    poller.stop();
  };
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  signals.forEach(sig => process.once(sig, shutdown));

  let code = 0;
  try {
    await poller.run();
  } catch (err) {
    log.error(`cannot get results from ${client.target}: ${formatError(err)}`);
    code = 1;
  } finally {
    signals.forEach(sig => process.off(sig, shutdown));
    client.close();
    // also closes the underlying HTTP server
    exported?.sockets.io.close();
  }
  return code;
};

// Execute as CLI when run directly
if (require.main === module) {
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(err => {
      console.error(err);
      process.exitCode = 1;
    });
}
