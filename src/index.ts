#!/usr/bin/env node
import { join } from 'path';
import { hideBin } from 'yargs/helpers';
import { ConfigurationManager, ConfigurationError } from './config/ConfigurationManager';
import { parseArguments, printHelp, UsageError, CommandLineOptions } from './config/CommandLine';
import { Logger } from './clients/Logger';
import { LocizeClient } from './clients/LocizeClient';
import { S3Client } from './clients/S3Client';
import { TranslationFetcher } from './clients/TranslationFetcher';
import { BackupManager, DependencyError } from './clients/BackupManager';
import { BackupGate } from './clients/BackupGate';
import { SummaryReporter, SUMMARIES_DIR } from './clients/SummaryReporter';
import { BackupConfig } from './interfaces/BackupConfig';
import { Logger as ILogger, LogLevel } from './interfaces/Logger';
import { LocizeClient as ILocizeClient } from './interfaces/LocizeClient';
import { S3Client as IS3Client } from './interfaces/S3Client';
import { sleep } from './utils/retry';
import { formatBackupDate } from './utils/timestamp';
import { TOOL_VERSION } from './version';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

/**
 * Construction hooks for the collaborators the application talks to
 */
export interface ApplicationFactories {
  createLogger(level: LogLevel): ILogger;
  createLocizeClient(config: BackupConfig): ILocizeClient;
  createS3Client(config: BackupConfig, logger: ILogger): IS3Client;
  clock(): Date;
  sleep(ms: number): Promise<void>;
}

const defaultFactories: ApplicationFactories = {
  createLogger: level => new Logger(level),
  createLocizeClient: config => new LocizeClient(config),
  createS3Client: (config, logger) => new S3Client(config, logger),
  clock: () => new Date(),
  sleep,
};

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Main application class: parses arguments, loads configuration, applies the
 * 24 hour gate, runs the backup and writes the summary
 */
class LocizeBackupApplication {
  private logger: ILogger;
  private config: BackupConfig | null = null;
  private backupManager: BackupManager | null = null;
  private readonly factories: ApplicationFactories;

  constructor(
    private readonly env: NodeJS.ProcessEnv = process.env,
    factories: Partial<ApplicationFactories> = {}
  ) {
    this.factories = { ...defaultFactories, ...factories };
    // Reconfigured once the configuration is loaded
    this.logger = this.factories.createLogger(LogLevel.INFO);
  }

  /**
   * Run the backup job and return the process exit code
   */
  async run(args: string[]): Promise<number> {
    let options: CommandLineOptions;
    try {
      options = parseArguments(args);
    } catch (error) {
      if (error instanceof UsageError) {
        this.logger.error(error.message);
        printHelp(text => process.stderr.write(`${text}\n`));
        return EXIT_FAILURE;
      }
      throw error;
    }

    if (options.help) {
      printHelp(text => process.stdout.write(`${text}\n`));
      return EXIT_SUCCESS;
    }

    try {
      return await this.execute(options);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        this.logger.error('Configuration validation failed', error, { field: error.field });
      } else if (error instanceof DependencyError) {
        this.logger.error('Missing required dependency', error, { dependency: error.dependency });
      } else {
        this.logger.error('Backup run failed', toError(error));
      }
      return EXIT_FAILURE;
    }
  }

  private async execute(options: CommandLineOptions): Promise<number> {
    const config = ConfigurationManager.loadConfiguration(this.env);
    this.config = config;
    this.logger = this.factories.createLogger(config.logLevel);

    this.logger.info('=== Locize Backup Started ===');
    this.logger.info(`Version: ${TOOL_VERSION}`);
    this.logger.info(`Timestamp: ${formatBackupDate(this.factories.clock())}`);
    if (options.force) {
      this.logger.info('Force backup mode enabled');
    }

    for (const warning of ConfigurationManager.getWarnings(config, this.env)) {
      this.logger.warn(warning);
    }
    this.logger.logConfigurationStart(ConfigurationManager.sanitizeForLogging(config));
    this.logger.info(
      config.storageType === 's3'
        ? `S3 storage configured: s3://${config.s3Bucket}`
        : `Local storage configured: ${config.backupDir}`
    );

    const s3Client =
      config.storageType === 's3' ? this.factories.createS3Client(config, this.logger) : null;
    const fetcher = new TranslationFetcher(
      this.factories.createLocizeClient(config),
      config,
      this.logger,
      this.factories.sleep
    );
    const backupManager = new BackupManager(config, {
      fetcher,
      s3Client,
      logger: this.logger,
      clock: this.factories.clock,
      sleep: this.factories.sleep,
    });
    this.backupManager = backupManager;

    await backupManager.validateDependencies();

    const gate = new BackupGate(
      join(config.backupDir, SUMMARIES_DIR),
      this.logger,
      this.factories.clock
    );
    const decision = await gate.check(options.force);
    if (decision.action === 'skip') {
      return EXIT_SUCCESS;
    }

    const result = await backupManager.executeBackup();

    const reporter = new SummaryReporter(config, this.logger, s3Client, this.factories.clock);
    await reporter.report(result);

    if (result.failed > 0) {
      this.logger.error('Backup completed with failures', undefined, {
        failedCombinations: result.failedCombinations,
      });
      return EXIT_FAILURE;
    }

    this.logger.success('Backup completed successfully');
    return EXIT_SUCCESS;
  }

  /**
   * Clean the partially written working directory (summaries are kept)
   */
  async handleInterrupt(signal: string): Promise<number> {
    this.logger.error(`Script interrupted (${signal})`);

    if (this.config?.cleanupLocalFiles && this.backupManager) {
      try {
        await this.backupManager.cleanupWorkingDirectory();
      } catch (error) {
        this.logger.error('Failed to clean up working directory', toError(error));
      }
    }

    return EXIT_INTERRUPTED;
  }

  /**
   * Setup signal handlers for interruption
   */
  setupSignalHandlers(): void {
    const signals = ['SIGTERM', 'SIGINT'] as const;

    signals.forEach(signal => {
      process.on(signal, async () => {
        const exitCode = await this.handleInterrupt(signal);
        process.exit(exitCode);
      });
    });

    process.on('unhandledRejection', reason => {
      this.logger.error('Unhandled promise rejection', toError(reason));
      process.exit(EXIT_FAILURE);
    });
  }
}

/**
 * Main application entry point
 */
async function main(): Promise<void> {
  const app = new LocizeBackupApplication();
  app.setupSignalHandlers();

  const exitCode = await app.run(hideBin(process.argv));
  process.exit(exitCode);
}

// Export for testing
export { LocizeBackupApplication, main };

if (require.main === module) {
  main().catch(error => {
    console.error('Fatal error running backup:', error);
    process.exit(EXIT_FAILURE);
  });
}
