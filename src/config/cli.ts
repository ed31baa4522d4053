// src/config/cli.ts
import {
  CHART_HEIGHT,
  LOG_LEVEL,
  MAX_NET_ERRORS,
  POLL_INTERVAL_SEC,
  PORT,
  REQUEST_TIMEOUT_MS,
  STAT_URL,
  WINDOW_SIZE,
} from 'App/config/config';
import { ValidationError } from 'App/errors/CustomError';
import { LogLevel, isLogLevel, levelFromVerbosity } from 'App/utils/logger';

export interface MonitorOptions {
  url: string;
  /** Time between polls. */
  intervalMs: number;
  requestTimeoutMs: number;
  /** Points kept per metric; also the chart width. */
  windowSize: number;
  chartHeight: number;
  /** Consecutive failed cycles tolerated before the poller gives up. */
  maxErrors: number;
  chart: boolean;
  serve: boolean;
  port: number;
  logLevel: LogLevel;
}

export type CliResult =
  | { help: true }
  | { help: false; options: MonitorOptions };

export const USAGE = `Usage: scanstat-monitor [options]

Options:
  --url <url>            stat endpoint to poll (default: ${STAT_URL})
  --interval <sec>       how often to poll, alias --timeout (default: ${POLL_INTERVAL_SEC})
  --request-timeout <ms> per-request timeout (default: the poll interval)
  --chart-width <n>      points kept per metric (default: ${WINDOW_SIZE})
  --chart-height <n>     rows per chart (default: ${CHART_HEIGHT})
  --max-errors <n>       consecutive failures before exit (default: ${MAX_NET_ERRORS})
  --serve                expose /api/stats, /metrics and Socket.IO 'stats' events
  --port <n>             HTTP port for --serve (default: ${PORT})
  --no-chart             do not draw terminal charts
  -v, --verbose          -v info, -vv debug, -vvv trace
  -h, --help             show this help`;

export function defaultOptions(): MonitorOptions {
  const intervalMs = Math.round(POLL_INTERVAL_SEC * 1000);
  return {
    url: STAT_URL,
    intervalMs,
    requestTimeoutMs: REQUEST_TIMEOUT_MS > 0 ? REQUEST_TIMEOUT_MS : intervalMs,
    windowSize: WINDOW_SIZE,
    chartHeight: CHART_HEIGHT,
    maxErrors: MAX_NET_ERRORS,
    chart: true,
    serve: false,
    port: PORT,
    logLevel: isLogLevel(LOG_LEVEL) ? LOG_LEVEL : 'warn',
  };
}

const positiveInt = (flag: string, raw: string): number => {
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ValidationError(`${flag} expects a positive integer, got "${raw}"`);
  }
  return n;
};

const nonNegativeInt = (flag: string, raw: string): number => {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) {
    throw new ValidationError(
      `${flag} expects a non-negative integer, got "${raw}"`,
    );
  }
  return n;
};

const seconds = (flag: string, raw: string): number => {
  const n = Number(raw);
  const ms = Math.round(n * 1000);
  if (!Number.isFinite(n) || ms < 1) {
    throw new ValidationError(`${flag} expects a positive number of seconds, got "${raw}"`);
  }
  return ms;
};

/**
 * Minimal argv parser; accepts `--flag value` and `--flag=value`.
 * @param argv - arguments after the script name
 */
export function parseCliArgs(
  argv: readonly string[],
  defaults: MonitorOptions = defaultOptions(),
): CliResult {
  const options: MonitorOptions = { ...defaults };
  let verbosity = 0;
  let timeoutSet = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq >= 0 ? arg.slice(0, eq) : arg;
    const inline = eq >= 0 ? arg.slice(eq + 1) : undefined;
    const value = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('-')) {
        throw new ValidationError(`${flag} requires a value`);
      }
      i += 1;
      return next;
    };

    if (/^-v+$/.test(flag)) {
      verbosity += flag.length - 1;
      continue;
    }

    switch (flag) {
      case '-h':
      case '--help':
        return { help: true };
      case '--verbose':
        verbosity += 1;
        break;
      case '--url':
        options.url = value();
        break;
      case '--interval':
      case '--timeout':
        options.intervalMs = seconds(flag, value());
        break;
      case '--request-timeout':
        options.requestTimeoutMs = positiveInt(flag, value());
        timeoutSet = true;
        break;
      case '--chart-width':
        options.windowSize = positiveInt(flag, value());
        break;
      case '--chart-height':
        options.chartHeight = positiveInt(flag, value());
        break;
      case '--max-errors':
        options.maxErrors = nonNegativeInt(flag, value());
        break;
      case '--serve':
        options.serve = true;
        break;
      case '--port':
        options.port = nonNegativeInt(flag, value());
        break;
      case '--no-chart':
        options.chart = false;
        break;
      default:
        throw new ValidationError(`Unknown option: ${arg}`);
    }
  }

  try {
    new URL(options.url);
  } catch {
    throw new ValidationError(`Invalid --url: ${options.url}`);
  }

  if (!timeoutSet && options.intervalMs !== defaults.intervalMs) {
    options.requestTimeoutMs = options.intervalMs;
  }
  if (verbosity > 0) options.logLevel = levelFromVerbosity(verbosity);

  return { help: false, options };
}
