/**
 * Commander program for the bullion CLI.
 *
 * Commands build a runtime (config, logger, market data, bot) on demand so
 * tests can substitute their own. The `interactive` command keeps one runtime
 * for the whole session.
 */

import { createInterface } from 'node:readline';
import { Command, InvalidArgumentError, Option } from 'commander';
import { ChartTimeframe, describeError, parseChartTimeframe } from '@bullion/contracts';
import { createLogger, withRunContext, type Logger } from '@bullion/logger';
import { DEMO_SCENARIOS, createMarketDataSource } from '@bullion/market-data';
import type { SignalEngineConfig } from '@bullion/signal-engine';
import { GoldSignalBot } from './bot.js';
import { buildSignalConfig, getConfigSummary, loadConfig, type Config } from './config/index.js';
import { SignalFormatter } from './formatters/signal-formatter.js';

export type CliOptions = {
  demo?: boolean;
  json?: boolean;
  symbol?: string;
  scenario?: string;
};

export interface Runtime {
  config: Config;
  signalConfig: SignalEngineConfig;
  logger: Logger;
  bot: GoldSignalBot;
}

interface RealtimeFlags {
  iterations: number;
  interval: number;
}

export interface CliIO {
  /** Line source for the interactive session */
  input: NodeJS.ReadableStream;
  out: (text: string) => void;
  err: (text: string) => void;
  setExitCode: (code: number) => void;
}

export interface ProgramOptions {
  createRuntime?: (options: CliOptions) => Runtime;
  io?: Partial<CliIO>;
  /** Throw CommanderError instead of exiting on usage errors */
  exitOverride?: boolean;
}

/**
 * Loads configuration, applies the CLI overrides and wires the bot.
 */
export function createRuntime(options: CliOptions, env: NodeJS.ProcessEnv = process.env): Runtime {
  const loaded = loadConfig(env);
  const config: Config = {
    ...loaded,
    app: {
      ...loaded.app,
      demoMode: options.demo === true || loaded.app.demoMode,
      symbol: options.symbol ?? loaded.app.symbol,
    },
  };

  const logger = createLogger({
    level: config.logging.level,
    json: config.logging.format === 'json',
    filePath: config.logging.filePath,
  });
  logger.debug('Configuration loaded', getConfigSummary(config));

  const signalConfig = buildSignalConfig(config);
  const marketData = createMarketDataSource({
    alphaVantageApiKey: config.provider.alphaVantageApiKey,
    demoMode: config.app.demoMode,
    timeoutMs: config.provider.timeoutMs,
    minRequestIntervalMs: config.provider.minRequestIntervalMs,
    demoScenario: DEMO_SCENARIOS.find((scenario) => scenario === options.scenario),
    logger,
  });

  const bot = new GoldSignalBot({ marketData, signalConfig, symbol: config.app.symbol, logger });
  return { config, signalConfig, logger, bot };
}

const INTERACTIVE_HELP = [
  'Commands:',
  '  quick [timeframe]     analyse one chart timeframe (default 1d)',
  '  multi                 analyse 1d, 2d and 5d and vote on a consensus',
  '  backtest [timeframe]  single analysis with performance metrics (default 5d)',
  '  summary               session summary',
  '  info                  configuration and session information',
  '  help                  show this list',
  '  exit                  leave the session',
].join('\n');

function parseTimeframeArgument(value: string): ChartTimeframe {
  try {
    return parseChartTimeframe(value);
  } catch (error) {
    throw new InvalidArgumentError(describeError(error));
  }
}

function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative number of seconds.');
  }
  return parsed;
}

/**
 * Builds the `bullion` command tree.
 *
 * @example
 * ```typescript
 * await createProgram().parseAsync(['node', 'bullion', '--demo', 'quick', '2d']);
 * ```
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const makeRuntime = options.createRuntime ?? ((cliOptions: CliOptions) => createRuntime(cliOptions));
  const io: CliIO = {
    input: options.io?.input ?? process.stdin,
    out: options.io?.out ?? ((text) => console.log(text)),
    err: options.io?.err ?? ((text) => console.error(text)),
    setExitCode:
      options.io?.setExitCode ??
      ((code) => {
        process.exitCode = code;
      }),
  };
  const formatter = new SignalFormatter();
  const program = new Command();

  // Set before subcommands are added so they inherit it
  program.configureOutput({
    writeOut: (text) => io.out(text.trimEnd()),
    writeErr: (text) => io.err(text.trimEnd()),
  });
  if (options.exitOverride) {
    program.exitOverride();
  }

  /**
   * Runs `handler` inside a run context; any throw is reported and sets exit code 1.
   */
  const run =
    <A extends unknown[]>(handler: (runtime: Runtime, cli: CliOptions, ...args: A) => Promise<boolean>) =>
    async (...args: A): Promise<void> => {
      const cli = program.opts<CliOptions>();
      try {
        const runtime = makeRuntime(cli);
        const succeeded = await withRunContext(() => handler(runtime, cli, ...args));
        if (!succeeded) {
          io.setExitCode(1);
        }
      } catch (error) {
        io.err(formatter.formatError(describeError(error)));
        io.setExitCode(1);
      }
    };

  const emit = (cli: CliOptions, value: unknown, text: string) => {
    io.out(cli.json ? JSON.stringify(value, null, 2) : text);
  };

  const quick = async (runtime: Runtime, cli: CliOptions, timeframe: ChartTimeframe) => {
    const signal = await runtime.bot.runSingleAnalysis(timeframe);
    if (!signal) {
      io.err(formatter.formatError('Analysis failed, see the log for details'));
      return false;
    }
    emit(cli, signal, formatter.formatSignal(signal, runtime.config.app.symbol));
    return true;
  };

  const multi = async (runtime: Runtime, cli: CliOptions) => {
    const result = await runtime.bot.runMultiTimeframeAnalysis();
    emit(cli, result, formatter.formatMultiTimeframe(result));
    return result.consensus.total > 0;
  };

  const backtest = async (runtime: Runtime, cli: CliOptions, timeframe: ChartTimeframe) => {
    const report = await runtime.bot.runBacktest(timeframe);
    emit(cli, report, formatter.formatBacktest(report));
    return report.status === 'COMPLETED';
  };

  const info = async (runtime: Runtime, cli: CliOptions) => {
    const session = runtime.bot.getSessionSummary();
    emit(
      cli,
      { config: getConfigSummary(runtime.config), signalConfig: runtime.signalConfig, session },
      formatter.formatSystemInfo(runtime.config, runtime.signalConfig, session)
    );
    return true;
  };

  const summary = async (runtime: Runtime, cli: CliOptions) => {
    const session = runtime.bot.getSessionSummary();
    emit(cli, session, formatter.formatSessionSummary(session));
    return true;
  };

  const dispatch = async (runtime: Runtime, cli: CliOptions, command: string, args: string[]): Promise<boolean> => {
    const [first] = args;
    switch (command) {
      case 'quick':
        return quick(runtime, cli, first === undefined ? ChartTimeframe.OneDay : parseChartTimeframe(first));
      case 'multi':
        return multi(runtime, cli);
      case 'backtest':
        return backtest(runtime, cli, first === undefined ? ChartTimeframe.FiveDay : parseChartTimeframe(first));
      case 'summary':
        return summary(runtime, cli);
      case 'info':
        return info(runtime, cli);
      case 'help':
        io.out(INTERACTIVE_HELP);
        return true;
      default:
        io.err(formatter.formatError(`Unknown command "${command}". Type "help" for the list.`));
        return false;
    }
  };

  /**
   * Reads commands line by line until `exit`, `quit` or end of input. Errors
   * are reported per line and do not end the session.
   */
  const interactive = async (runtime: Runtime, cli: CliOptions) => {
    if (!cli.json) {
      io.out(INTERACTIVE_HELP);
    }
    const lines = createInterface({ input: io.input, terminal: false });
    try {
      for await (const line of lines) {
        const [command = '', ...args] = line.trim().split(/\s+/);
        if (command === '') continue;
        if (command === 'exit' || command === 'quit') break;
        try {
          await withRunContext(() => dispatch(runtime, cli, command, args));
        } catch (error) {
          io.err(formatter.formatError(describeError(error)));
        }
      }
    } finally {
      lines.close();
    }
    return true;
  };

  program
    .name('bullion')
    .description('Technical-analysis trading signals for gold')
    .version('0.1.0')
    .option('--demo', 'use generated demo data instead of live providers', false)
    .option('--json', 'print machine-readable JSON', false)
    .option('-s, --symbol <symbol>', 'instrument symbol (default from DEFAULT_SYMBOL or GLD)')
    .addOption(new Option('--scenario <name>', 'demo data scenario').choices([...DEMO_SCENARIOS]));

  program
    .command('quick')
    .description('analyse a single chart timeframe')
    .argument('[timeframe]', 'chart timeframe: 1d, 2d or 5d', parseTimeframeArgument, ChartTimeframe.OneDay)
    .action(run(quick));

  program
    .command('multi')
    .description('analyse the 1d, 2d and 5d charts and vote on a consensus')
    .action(run(multi));

  program
    .command('backtest')
    .description('run one analysis and report it with basic performance metrics')
    .argument('[timeframe]', 'chart timeframe: 1d, 2d or 5d', parseTimeframeArgument, ChartTimeframe.FiveDay)
    .action(run(backtest));

  program
    .command('realtime')
    .description('repeat the analysis a number of times')
    .argument('[timeframe]', 'chart timeframe: 1d, 2d or 5d', parseTimeframeArgument, ChartTimeframe.OneDay)
    .option('-n, --iterations <count>', 'number of analysis cycles', parseCount, 1)
    .option('-i, --interval <seconds>', 'pause between cycles', parseSeconds, 0)
    .action(
      run(async (runtime: Runtime, cli: CliOptions, timeframe: ChartTimeframe, commandOptions: RealtimeFlags) => {
        const signals = await runtime.bot.runRealtime(timeframe, {
          iterations: commandOptions.iterations,
          intervalMs: commandOptions.interval * 1000,
          onIteration: (iteration, signal) => {
            if (cli.json) return;
            io.out(`--- Iteration ${iteration}/${commandOptions.iterations} ---`);
            io.out(
              signal
                ? formatter.formatSignal(signal, runtime.config.app.symbol)
                : formatter.formatError('Analysis failed, see the log for details')
            );
          },
        });

        const session = runtime.bot.getSessionSummary();
        emit(cli, { signals, session }, formatter.formatSessionSummary(session));
        return signals.some((signal) => signal !== null);
      })
    );

  program
    .command('info')
    .description('show configuration and session information')
    .action(run(info));

  program
    .command('interactive')
    .description('read commands from stdin, keeping one session for all of them')
    .action(run(interactive));

  return program;
}
