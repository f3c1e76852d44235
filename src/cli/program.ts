import { readFileSync } from 'node:fs';
import { Command, CommanderError } from 'commander';
import { formatError } from '../lib/errors/index.js';
import { parseDuration } from '../lib/duration/index.js';
import {
  createInterruptSignal,
  createKeySource,
  startTicker,
} from '../lib/events/index.js';
import { AnsiTerminal } from '../lib/terminal/index.js';
import { DEFAULT_TIMER_OPTIONS, runTimer } from '../lib/runner/index.js';
import type { TimerOutcome } from '../lib/runner/index.js';

const STDERR_FD = 2;

export interface CliDependencies {
  /** Run the interactive timer for an already parsed duration. */
  runTimer: (durationMs: number) => Promise<TimerOutcome>;
  writeOut: (text: string) => void;
  writeErr: (text: string) => void;
}

/** Version from the package manifest, which sits two levels above both src/cli and dist/cli. */
export function readVersion(): string {
  const manifest: unknown = JSON.parse(
    readFileSync(new URL('../../package.json', import.meta.url), 'utf8'),
  );
  if (
    typeof manifest === 'object' &&
    manifest !== null &&
    'version' in manifest &&
    typeof manifest.version === 'string'
  ) {
    return manifest.version;
  }
  return '0.0.0';
}

/** Wire the timer to the real terminal, stdin, and process signals. */
export function runOnProcessTerminal(durationMs: number): Promise<TimerOutcome> {
  const stdin = process.stdin;
  const interactive = stdin.isTTY === true;
  return runTimer(durationMs, {
    terminal: new AnsiTerminal({ fd: STDERR_FD, input: interactive ? stdin : undefined }),
    ticker: startTicker(DEFAULT_TIMER_OPTIONS.tickPeriodMs),
    input: interactive ? createKeySource(stdin) : undefined,
    interrupt: createInterruptSignal(process),
  });
}

export function defaultCliDependencies(): CliDependencies {
  return {
    runTimer: runOnProcessTerminal,
    writeOut: (text) => process.stdout.write(text),
    writeErr: (text) => process.stderr.write(text),
  };
}

export function createProgram(deps: CliDependencies, onExit: (code: number) => void): Command {
  return new Command()
    .name('countdown')
    .description('Count down a duration in the terminal. Space pauses, q quits.')
    .version(readVersion())
    .argument('<duration>', 'duration in [[[d:]h:]m:]s[.ms] format, e.g. 1:30 or 2:0:0')
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({ writeOut: deps.writeOut, writeErr: deps.writeErr })
    .action(async (input: string) => {
      let durationMs: number;
      try {
        durationMs = parseDuration(input);
      } catch (err) {
        deps.writeErr(`${formatError(err)}\n`);
        onExit(1);
        return;
      }

      try {
        await deps.runTimer(durationMs);
        onExit(0);
      } catch (err) {
        deps.writeErr(`${formatError(err)}\n`);
        onExit(1);
      }
    });
}

/**
 * Parse `argv` (as in `process.argv`) and run the timer. Resolves with the
 * process exit code: 0 after the timer finishes or is stopped, or after help
 * and version output; non-zero on usage, duration, or terminal errors.
 */
export async function runCli(
  argv: readonly string[],
  deps: CliDependencies = defaultCliDependencies(),
): Promise<number> {
  let exitCode = 0;
  const program = createProgram(deps, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv]);
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
  return exitCode;
}
