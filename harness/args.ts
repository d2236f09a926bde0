/**
 * Table Carpenter CLI - Argument Parsing
 */

export type OutputFormat = 'html' | 'csv' | 'xlsx';

export interface CLIArgs {
  /** Subcommand: 'render', undefined when none given */
  subcommand?: 'render';
  /** Table name for render */
  tableName?: string;
  /** Module registering tables */
  tables?: string;
  format: OutputFormat;
  /** Output file; stdout when absent */
  out?: string;
  template?: string;
  /** Request query parameters (--query key=value) */
  query: Record<string, string>;
  verbose: boolean;
  help: boolean;
  /** Problems found while parsing */
  errors: string[];
}

const FORMATS: readonly OutputFormat[] = ['html', 'csv', 'xlsx'];

function isOutputFormat(value: string): value is OutputFormat {
  return FORMATS.some((format) => format === value);
}

export function parseArgs(args: string[]): CLIArgs {
  const result: CLIArgs = {
    format: 'html',
    query: {},
    verbose: false,
    help: false,
    errors: [],
  };

  let i = 0;

  if (args.length > 0 && args[0] === 'render') {
    result.subcommand = 'render';
    i = 1;
  }

  const takeValue = (option: string): string | undefined => {
    i++;
    if (i < args.length) {
      return args[i];
    }
    result.errors.push(`${option} requires a value`);
    return undefined;
  };

  while (i < args.length) {
    const arg = args[i];

    switch (arg) {
      case '--tables':
      case '-t':
        result.tables = takeValue(arg);
        break;
      case '--format':
      case '-f': {
        const value = takeValue(arg);
        if (value !== undefined) {
          if (isOutputFormat(value)) {
            result.format = value;
          } else {
            result.errors.push(`Unknown format: ${value} (expected ${FORMATS.join(', ')})`);
          }
        }
        break;
      }
      case '--out':
      case '-o':
        result.out = takeValue(arg);
        break;
      case '--template':
        result.template = takeValue(arg);
        break;
      case '--query':
      case '-q': {
        const value = takeValue(arg);
        if (value !== undefined) {
          const eq = value.indexOf('=');
          if (eq <= 0) {
            result.errors.push(`--query expects key=value, got "${value}"`);
          } else {
            result.query[value.slice(0, eq)] = value.slice(eq + 1);
          }
        }
        break;
      }
      case '--verbose':
      case '-v':
        result.verbose = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      default:
        if (arg.startsWith('-')) {
          result.errors.push(`Unknown option: ${arg}`);
        } else if (result.subcommand !== undefined && result.tableName === undefined) {
          result.tableName = arg;
        } else {
          result.errors.push(`Unexpected argument: ${arg}`);
        }
    }
    i++;
  }

  if (!result.help) {
    if (result.subcommand === undefined) {
      result.errors.push('Missing command (expected "render")');
    } else if (result.tableName === undefined) {
      result.errors.push('Missing table name');
    }
    if (result.format === 'xlsx' && result.out === undefined) {
      result.errors.push('--format xlsx requires --out');
    }
  }

  return result;
}
