import { ValidationError } from './errors.js';

export interface GlobalArgs {
  configPath?: string;
}

export type Command =
  | {
      name: 'generate';
      paperId: string;
      download: boolean;
      force: boolean;
      usePdfLlm: boolean;
      apiKey?: string;
      pptx: boolean;
      comments: string[];
    }
  | { name: 'batch'; inputFile: string; outputDir?: string; apiKey?: string }
  | { name: 'config-show' }
  | { name: 'history'; limit: number }
  | { name: 'help' };

export type ParsedArgs = GlobalArgs & { command: Command };

function takeValue(args: string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined || value.startsWith('-')) {
    throw new ValidationError(`${flag} requires a value`);
  }
  return value;
}

/** `--config PATH` may appear anywhere; the first positional names the command. */
export function parseArgs(argv: string[]): ParsedArgs {
  const rest: string[] = [];
  let configPath: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === '--config') {
      configPath = takeValue(argv, i, '--config');
      i++;
    } else {
      rest.push(argv[i]);
    }
  }

  const [name, ...args] = rest;
  if (name === undefined || name === 'help' || name === '--help' || name === '-h') {
    return { configPath, command: { name: 'help' } };
  }

  switch (name) {
    case 'generate': {
      const command: Extract<Command, { name: 'generate' }> = {
        name: 'generate',
        paperId: '',
        download: true,
        force: false,
        usePdfLlm: true,
        pptx: false,
        comments: [],
      };
      for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--download') {
          command.download = true;
        } else if (arg === '--no-download') {
          command.download = false;
        } else if (arg === '--force' || arg === '-f') {
          command.force = true;
        } else if (arg === '--no-pdf-llm') {
          command.usePdfLlm = false;
        } else if (arg === '--pptx') {
          command.pptx = true;
        } else if (arg === '--api-key' || arg === '-k') {
          command.apiKey = takeValue(args, i++, arg);
        } else if (arg === '--comment') {
          command.comments.push(takeValue(args, i++, arg));
        } else if (arg.startsWith('-')) {
          throw new ValidationError(`Unknown option for generate: ${arg}`);
        } else if (!command.paperId) {
          command.paperId = arg;
        } else {
          throw new ValidationError(`Unexpected argument: ${arg}`);
        }
      }
      if (!command.paperId) {
        throw new ValidationError('generate requires a paper ID');
      }
      return { configPath, command };
    }

    case 'batch': {
      let inputFile: string | undefined;
      let outputDir: string | undefined;
      let apiKey: string | undefined;
      for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--output' || arg === '-o') {
          outputDir = takeValue(args, i++, arg);
        } else if (arg === '--api-key' || arg === '-k') {
          apiKey = takeValue(args, i++, arg);
        } else if (arg.startsWith('-')) {
          throw new ValidationError(`Unknown option for batch: ${arg}`);
        } else if (!inputFile) {
          inputFile = arg;
        } else {
          throw new ValidationError(`Unexpected argument: ${arg}`);
        }
      }
      if (!inputFile) {
        throw new ValidationError('batch requires an input file');
      }
      return { configPath, command: { name: 'batch', inputFile, outputDir, apiKey } };
    }

    case 'config-show':
      return { configPath, command: { name: 'config-show' } };

    case 'history': {
      let limit = 10;
      for (let i = 0; i < args.length; i++) {
        if (args[i] === '--limit') {
          limit = parseInt(takeValue(args, i++, '--limit'), 10);
          if (!Number.isInteger(limit) || limit < 1) {
            throw new ValidationError('--limit must be a positive integer');
          }
        } else {
          throw new ValidationError(`Unexpected argument: ${args[i]}`);
        }
      }
      return { configPath, command: { name: 'history', limit } };
    }

    default:
      throw new ValidationError(`Unknown command: ${name}`);
  }
}

/** Paper IDs from a batch file: one per line, blank lines and `#` comments skipped. */
export function parseIdList(text: string): string[] {
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}
