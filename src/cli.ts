/**
 * noderange — Command-line shell
 *
 * n2r: node list → range notation
 * r2n: range notation → node list
 *
 * The binary dispatches on the name it was invoked as, so symlinks
 * named n2r and r2n behave like the matching subcommand.
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { ParseError } from './errors';
import { expand, ExpansionError, DEFAULT_MAX_EXPANSION } from './expander';
import type { ExpandOptions } from './expander';
import { expandUnique } from './sorter';
import { condense } from './condenser';
import { isNodeInRange } from './index';

export const VERSION = '0.1.0';

const PROGRAM_NAME = 'noderange';
const MODES = ['n2r', 'r2n'];

/** Exit status for bad input or usage; 1 is left for a negative answer. */
export const EXIT_ERROR = 2;

export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

const processIO: CliIO = {
  out: text => process.stdout.write(text),
  err: text => process.stderr.write(text),
};

interface CommonOpts {
  maxExpansion?: number;
}

function parseLimit(value: string): number {
  if (!/^[0-9]+$/.test(value)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parseInt(value, 10);
}

/**
 * Build the commander program. Results go to io.out, diagnostics to
 * io.err prefixed with the program name; the exit status of the last
 * action is reported through setExitCode.
 */
export function createProgram(
  io: CliIO,
  setExitCode: (code: number) => void,
  name: string = PROGRAM_NAME,
): Command {
  const program = new Command();

  function expandOptions(): ExpandOptions {
    const opts = program.opts<CommonOpts>();
    return { maxExpansion: opts.maxExpansion ?? DEFAULT_MAX_EXPANSION };
  }

  // Input errors are reported, never thrown past the action
  function guarded(action: () => void): void {
    try {
      action();
    } catch (e) {
      if (e instanceof ParseError || e instanceof ExpansionError) {
        io.err(`${program.name()}: ${e.message}\n`);
        setExitCode(EXIT_ERROR);
        return;
      }
      throw e;
    }
  }

  program
    .name(name)
    .description('Convert between node lists and node range notation.')
    .version(VERSION, '-v, --version', 'Show version')
    .helpOption('-h, --help', 'Show help')
    .showHelpAfterError()
    .option('-m, --max-expansion <n>', `Maximum number of nodes the input may expand to (default ${DEFAULT_MAX_EXPANSION}, 0 disables)`, parseLimit)
    .exitOverride()
    .configureOutput({
      writeOut: text => io.out(text),
      writeErr: text => io.err(text),
    });

  program
    .command('n2r')
    .description('Condense node names into range notation, e.g. node[00-03],node07.')
    .argument('<names...>', 'Node names or ranges, separated by spaces or commas')
    .action((names: string[]) => guarded(() => {
      io.out(condense(names, expandOptions()) + '\n');
      setExitCode(0);
    }));

  program
    .command('r2n')
    .description('Expand range notation into individual node names.')
    .argument('<ranges...>', 'Node names or ranges, separated by spaces or commas')
    .option('-u, --unique', 'Sort and remove duplicates', false)
    .option('-l, --lines', 'Print one node per line', false)
    .action((ranges: string[], cmdOpts: { unique?: boolean; lines?: boolean }) => guarded(() => {
      const options = expandOptions();
      const nodes = cmdOpts.unique ? expandUnique(ranges, options) : expand(ranges, options);
      const names = nodes.map(node => node.name);
      io.out(names.join(cmdOpts.lines ? '\n' : ' ') + '\n');
      setExitCode(0);
    }));

  program
    .command('contains')
    .description('Exit 0 if the node belongs to the ranges, 1 if not, 2 on bad input.')
    .argument('<node>', 'Node name to look for')
    .argument('<ranges...>', 'Node names or ranges, separated by spaces or commas')
    .action((node: string, ranges: string[]) => guarded(() => {
      const found = isNodeInRange(node, ranges, expandOptions());
      io.out(found ? 'yes\n' : 'no\n');
      setExitCode(found ? 0 : 1);
    }));

  return program;
}

/**
 * Run the CLI and return its exit status.
 *
 * @param argv - Arguments after the executable and script path
 * @param invokedAs - Basename the binary was started as (n2r, r2n or noderange)
 */
export function run(argv: readonly string[], invokedAs: string = PROGRAM_NAME, io: CliIO = processIO): number {
  let exitCode = 0;
  const isMode = MODES.includes(invokedAs);
  const program = createProgram(
    io,
    code => {
      exitCode = code;
    },
    isMode ? invokedAs : PROGRAM_NAME,
  );

  const args = isMode ? [invokedAs, ...argv] : [...argv];

  try {
    program.parse(args, { from: 'user' });
  } catch (e) {
    if (e instanceof CommanderError) {
      // --help and --version exit 0; usage errors count as bad input
      return e.exitCode === 0 ? 0 : EXIT_ERROR;
    }
    throw e;
  }

  return exitCode;
}
