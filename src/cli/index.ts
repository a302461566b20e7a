#!/usr/bin/env node

import { Command } from 'commander';
import color from 'picocolors';
import { CleanOrchestrator } from '../orchestrators/CleanOrchestrator';
import { ProfileLoader } from '../loaders/ProfileLoader';
import { EntryExpander } from '../resolvers/EntryExpander';
import { RetentionResolver } from '../resolvers/RetentionResolver';
import { PathCanonicalizer } from '../resolvers/PathCanonicalizer';
import { Remover, nodeFileSystem } from '../removers/Remover';
import { Reporter } from '../reporters/Reporter';
import { ConsolePrompter } from '../prompts/ConsolePrompter';
import { SizeCalculator } from '../utils/SizeCalculator';
import { CleanConfig, CleanReport, RunMode } from '../types';
import { errorMessage } from '../errors';

export interface CleanCommandOptions {
  profile?: string;
  mode?: string;
  verbose?: boolean;
  logPath?: string;
}

export interface ValidateCommandOptions {
  profile?: string;
}

const MODE_ALIASES: Record<string, RunMode> = {
  'silent': 'silent',
  'everyentry': 'everyEntry',
  'every-entry': 'everyEntry',
  'everypath': 'everyPath',
  'every-path': 'everyPath'
};

/**
 * CLI interface for profile-sweep
 */
class ProfileSweepCLI {
  private program: Command;

  constructor() {
    this.program = new Command();
    this.setupCommands();
  }

  /**
   * Setup CLI commands and options
   */
  private setupCommands(): void {
    this.program
      .name('profile-sweep')
      .description('Delete files and directories described by a cleanup profile')
      .version('1.0.0');

    // Main clean command
    this.program
      .command('clean', { isDefault: true })
      .description('Resolve the profile entries and delete the matching paths')
      .requiredOption('-p, --profile <path>', 'Path to the profile file')
      .option('-m, --mode <mode>', 'Confirmation mode (silent, everyEntry, everyPath)', 'everyPath')
      .option('-v, --verbose', 'Enable verbose logging')
      .option('--log-path <path>', 'Directory for log files and saved reports')
      .action(async (options: CleanCommandOptions) => {
        try {
          await this.executeClean(options);
        } catch (error) {
          console.error(color.red(`❌ Failed to clean items: ${errorMessage(error)}.`));
          process.exit(1);
        }
      });

    // Profile validation command
    this.program
      .command('validate')
      .description('Check that a profile loads and every pattern compiles')
      .requiredOption('-p, --profile <path>', 'Path to the profile file')
      .action(async (options: ValidateCommandOptions) => {
        try {
          await this.validateProfile(options);
        } catch (error) {
          console.error(color.red(`❌ Profile validation failed: ${errorMessage(error)}`));
          process.exit(1);
        }
      });
  }

  /**
   * Execute clean operation
   */
  async executeClean(options: CleanCommandOptions): Promise<void> {
    const config = this.loadConfig(options);
    const reporter = new Reporter(config.reporting.logPath, config.reporting.verbose);

    try {
      const orchestrator = this.createOrchestrator(reporter);
      const report = await orchestrator.clean(config.profilePath, config.mode);

      this.displayReport(report);
    } finally {
      reporter.close();
    }
  }

  /**
   * Validate a profile without touching the filesystem
   */
  async validateProfile(options: ValidateCommandOptions): Promise<void> {
    const config = this.loadConfig(options);
    const reporter = new Reporter(undefined, false);

    try {
      const orchestrator = this.createOrchestrator(reporter);
      const errors = await orchestrator.validate(config.profilePath);

      if (errors.length > 0) {
        errors.forEach(error => console.log(`   • ${error.entry ?? ''} ${color.dim(error.message)}`));
        throw new Error(`${errors.length} invalid pattern(s)`);
      }

      console.log(color.green('✅ Profile is valid!'));
    } finally {
      reporter.close();
    }
  }

  /**
   * Build configuration from defaults and CLI options
   */
  loadConfig(options: CleanCommandOptions): CleanConfig {
    const config = this.createDefaultConfig();
    this.applyCliOptions(config, options);

    if (!config.profilePath) {
      throw new Error('A profile path is required (--profile <path>)');
    }

    return config;
  }

  /**
   * Create default configuration
   */
  private createDefaultConfig(): CleanConfig {
    return {
      profilePath: '',
      mode: 'everyPath',
      reporting: {
        verbose: false
      }
    };
  }

  /**
   * Apply CLI options to configuration
   */
  private applyCliOptions(config: CleanConfig, options: CleanCommandOptions): void {
    if (options.profile) {
      config.profilePath = options.profile;
    }

    if (options.mode) {
      config.mode = this.parseMode(options.mode);
    }

    if (options.verbose) {
      config.reporting.verbose = true;
    }

    if (options.logPath) {
      config.reporting.logPath = options.logPath;
    }
  }

  /**
   * Parse run mode from string
   */
  parseMode(mode: string): RunMode {
    const parsed = MODE_ALIASES[mode.trim().toLowerCase()];
    if (!parsed) {
      throw new Error(`Invalid mode: ${mode}. Valid modes: silent, everyEntry, everyPath`);
    }
    return parsed;
  }

  /**
   * Create orchestrator with all dependencies
   */
  private createOrchestrator(reporter: Reporter): CleanOrchestrator {
    const logger = reporter.getLogger();
    const cwd = process.cwd();

    return new CleanOrchestrator(
      new ProfileLoader(),
      new EntryExpander(new RetentionResolver(), cwd),
      new PathCanonicalizer(cwd, logger),
      new Remover(nodeFileSystem, logger),
      reporter,
      new ConsolePrompter()
    );
  }

  /**
   * Display clean report
   */
  private displayReport(report: CleanReport): void {
    console.log(`\n🧹 CLEAN REPORT ${color.dim(report.profileName)}`);
    console.log('='.repeat(50));

    console.log(`📊 Paths Resolved: ${report.summary.pathsResolved}`);
    console.log(`🗑️ Paths Removed: ${report.summary.pathsRemoved}`);
    console.log(`💾 Space Reclaimed: ${SizeCalculator.formatBytes(report.summary.bytesReclaimed)}`);
    console.log(`⏱️ Removal Time: ${report.summary.removalTime}ms`);

    if (report.details.skipped.length > 0) {
      console.log(`⏭️ Paths Skipped: ${report.details.skipped.length}`);
    }

    if (report.summary.pathsFailed > 0) {
      console.log(color.yellow(`⚠️ Paths Failed: ${report.summary.pathsFailed}`));
    }

    if (report.details.errors.length > 0) {
      console.log(color.yellow(`❌ Errors: ${report.details.errors.length}`));
      report.details.errors.forEach(error => {
        console.log(`   • ${error.message}`);
      });
    }

    console.log('='.repeat(50));
    console.log(color.green('✅ Successfully cleaned items.'));
  }

  /**
   * Run the CLI
   */
  public async run(argv: string[] = process.argv): Promise<void> {
    await this.program.parseAsync(argv);
  }
}

// Run CLI if this file is executed directly
if (require.main === module) {
  const cli = new ProfileSweepCLI();
  cli.run().catch(error => {
    console.error('❌ CLI Error:', errorMessage(error));
    process.exit(1);
  });
}

export { ProfileSweepCLI };
