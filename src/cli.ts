import { singleColumn, multipleColumns } from './targets/indexTarget.js';
import { isLocal, parseTarget, primaryColumnName, serializeTargets } from './targets/targetParser.js';
import type { ColumnResolver, IndexTargetExpr } from './types.js';

export interface CliOptions {
  command?: string;
  args: string[];
  columns?: string[];
  verbose: boolean;
  help: boolean;
}

type Output = (line: string) => void;

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { args: [], verbose: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--verbose' || arg === '-v') {
      options.verbose = true;
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg === '--columns' || arg === '-c') {
      options.columns = splitList(argv[++i] ?? '');
    } else if (options.command === undefined) {
      options.command = arg;
    } else {
      options.args.push(arg);
    }
  }

  return options;
}

function splitList(text: string): string[] {
  return text
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/**
 * `a` is a single column target, `a,b` a composite one.
 */
export function parseTargetExpr(text: string): IndexTargetExpr {
  const [first, ...rest] = splitList(text);
  if (first === undefined) {
    throw new Error(`Invalid target expression: "${text}"`);
  }
  return rest.length === 0 && !text.includes(',') ? singleColumn(first) : multipleColumns([first, ...rest]);
}

/**
 * Without a column list every name resolves to itself.
 */
function columnResolver(columns?: string[]): ColumnResolver<string> {
  if (!columns) return (name) => name;
  const known = new Set(columns);
  return (name) => (known.has(name) ? name : undefined);
}

export function inspectTarget(target: string, columns?: string[]): string[] {
  const descriptor = parseTarget(target, columnResolver(columns));

  return [
    `target:  ${target}`,
    `mode:    ${descriptor.mode}`,
    `pk:      ${descriptor.partitionKeyColumns.join(', ')}`,
    `ck:      ${descriptor.clusteringKeyColumns.join(', ')}`,
    `local:   ${isLocal(target)}`,
    `primary: ${primaryColumnName(target)}`,
  ];
}

export function showHelp(out: Output = console.log): void {
  out('index-target');
  out('');
  out('Inspect and build secondary index target strings.');
  out('');
  out('Usage:');
  out('  index-target inspect <target> [--columns a,b,c]');
  out('  index-target serialize <expr>...');
  out('');
  out('Options:');
  out('  -c, --columns <list>      Columns of the table; other names fail to resolve');
  out('  -v, --verbose             Print error stacks');
  out('  -h, --help                Show this help');
  out('');
  out('Examples:');
  out("  index-target inspect 'keys(attributes)'");
  out('  index-target inspect \'{"pk":["id"],"ck":["email"]}\' --columns id,email');
  out('  index-target serialize id,region email');
  out('');
}

/**
 * Runs a command and returns the process exit code.
 */
export function runCli(argv: string[], out: Output = console.log, err: Output = console.error): number {
  const options = parseArgs(argv);

  if (options.help || options.command === undefined) {
    showHelp(out);
    return options.help ? 0 : 1;
  }

  try {
    switch (options.command) {
      case 'inspect': {
        const [target] = options.args;
        if (target === undefined) {
          throw new Error('inspect requires a target');
        }
        inspectTarget(target, options.columns).forEach((line) => out(line));
        return 0;
      }
      case 'serialize':
        out(serializeTargets(options.args.map(parseTargetExpr)));
        return 0;
      default:
        err(`Unknown command: ${options.command}`);
        return 1;
    }
  } catch (error) {
    if (options.verbose && error instanceof Error && error.stack) {
      err(error.stack);
    } else {
      err(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    return 1;
  }
}
