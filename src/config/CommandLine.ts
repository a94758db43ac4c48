import yargs from 'yargs';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CommandLineOptions {
  force: boolean;
  help: boolean;
}

function buildParser(args: string[]) {
  return yargs(args)
    .scriptName('locize-backup')
    .usage(
      'Usage: $0 [OPTIONS]\n\n' +
        'Downloads internationalization files from locize and optionally uploads them to S3.\n' +
        'By default it exits without doing anything if a backup was already performed\n' +
        'within the last 24 hours.'
    )
    // Built-in help off before -h/--help is declared; later calls delete the option
    .help(false)
    .version(false)
    .option('force', {
      type: 'boolean',
      default: false,
      describe: 'Force backup even if one was run within the last 24 hours',
    })
    .option('help', {
      alias: 'h',
      type: 'boolean',
      default: false,
      describe: 'Show this help message',
    })
    .example('$0', 'Run backup (skip if run within 24 hours)')
    .example('$0 --force', 'Force backup regardless of timing')
    .strict()
    .exitProcess(false)
    .fail((message: string, error: Error | undefined) => {
      throw new UsageError(message || error?.message || 'Invalid arguments');
    });
}

/**
 * Parse command line arguments (without the node and script entries)
 */
export function parseArguments(args: string[]): CommandLineOptions {
  const argv = buildParser(args).parseSync();
  return { force: argv.force, help: argv.help };
}

/**
 * Print the help text through the given writer
 */
export function printHelp(write: (text: string) => void): void {
  buildParser([]).showHelp(write);
}
