import { join } from 'path';
import { ConfigLoader, ConfigLoaderService } from '../services/config-loader.service.js';
import { FsFileReader } from '../services/fs-file-reader.js';
import { openSecretRegistry } from '../services/file-secret-registry.js';
import { FileReader } from '../interfaces/file-reader.interface.js';
import { WatchSourceFactory } from '../interfaces/watch-source.interface.js';
import { FrozenSecretsWatchConfig } from '../schemas/config.schema.js';
import { CONFIG } from '../constants/config-constants.js';
import { TEXT } from '../constants/text-constants.js';
import { sanitizeError } from '../utils/security.js';
import { isHiddenEntry, isVisibleSecretEntry } from '../utils/validation.js';
import { fmt } from '../utils/format.js';

// ANSI color codes for terminal output
const colors = {
  reset: CONFIG.ANSI_RESET,
  red: CONFIG.ANSI_RED,
  green: CONFIG.ANSI_GREEN,
  yellow: CONFIG.ANSI_YELLOW,
  blue: CONFIG.ANSI_BLUE,
  cyan: CONFIG.ANSI_CYAN,
  gray: CONFIG.ANSI_GRAY
};

export type DiagnosticStatus = 'OK' | 'WARN' | 'ERROR';

export interface DiagnosticResult {
  check: string;
  status: DiagnosticStatus;
  message: string;
  details?: string[];
}

export interface DiagnosticSummary {
  total: number;
  passed: number;
  warnings: number;
  errors: number;
}

export interface DoctorOptions {
  configLoader?: ConfigLoader;
  fileReader?: FileReader;
  watchSourceFactory?: WatchSourceFactory;
}

// Format message with color
function colorize(text: string, color: keyof typeof colors): string {
  return `${colors[color]}${text}${colors.reset}`;
}

// Print section header
function printHeader(title: string): void {
  console.log(`\n${colorize(CONFIG.CLI_SEPARATOR_LINE, 'blue')}`);
  console.log(colorize(`  ${title}`, 'cyan'));
  console.log(`${colorize(CONFIG.CLI_SEPARATOR_LINE, 'blue')}\n`);
}

// Print diagnostic result
function printResult(result: DiagnosticResult): void {
  const statusColor = result.status === 'OK' ? 'green' :
                      result.status === 'WARN' ? 'yellow' : 'red';
  const statusIcon = result.status === 'OK' ? '✅' :
                     result.status === 'WARN' ? '⚠️ ' : '❌';

  console.log(`${statusIcon} ${colorize(result.status, statusColor)} - ${result.check}`);
  console.log(`  ${colorize(result.message, 'gray')}`);

  for (const detail of result.details ?? []) {
    console.log(`    • ${colorize(detail, 'gray')}`);
  }
}

/**
 * Diagnoses a secret directory: configuration, directory access, every
 * visible secret file, and whether a watcher can be opened on it.
 * Secret values are never printed.
 */
export class DoctorCLI {
  private results: DiagnosticResult[] = [];
  private readonly configLoader: ConfigLoader;
  private readonly reader: FileReader;
  private readonly watchSourceFactory?: WatchSourceFactory;

  constructor(configPath?: string, options: DoctorOptions = {}) {
    this.configLoader = options.configLoader ?? new ConfigLoaderService(configPath);
    this.reader = options.fileReader ?? new FsFileReader();
    this.watchSourceFactory = options.watchSourceFactory;
  }

  async run(): Promise<void> {
    printHeader(TEXT.DOCTOR_HEADER);
    console.log(`Analyzing: ${colorize(this.configLoader.getConfigPath(), 'yellow')}\n`);

    const summary = await this.diagnose();
    this.printSummary(summary);

    process.exit(summary.errors > 0 ? CONFIG.EXIT_CODE_INVALID_CONFIG : CONFIG.EXIT_CODE_SUCCESS);
  }

  async diagnose(): Promise<DiagnosticSummary> {
    this.results = [];

    const config = await this.checkConfig();
    if (config) {
      const keys = await this.checkDirectory(config.basePath);
      if (keys) {
        await this.checkSecrets(config, keys);
        await this.checkWatcher(config.basePath);
      }
    }

    return this.getSummary();
  }

  getResults(): readonly DiagnosticResult[] {
    return this.results;
  }

  private async checkConfig(): Promise<FrozenSecretsWatchConfig | undefined> {
    console.log(colorize(TEXT.DOCTOR_CHECKING_CONFIG, 'blue'));

    try {
      const config = await this.configLoader.loadConfig();
      this.results.push({
        check: 'Configuration',
        status: 'OK',
        message: TEXT.DOCTOR_CONFIG_VALID,
        details: [
          `Version: ${config.version}`,
          `Base path: ${config.basePath}`,
          `Configured secrets: ${config.secrets?.length ?? 'all'}`
        ]
      });
      return config;
    } catch (error) {
      this.results.push({
        check: 'Configuration',
        status: 'ERROR',
        message: TEXT.DOCTOR_CONFIG_INVALID,
        details: [sanitizeError(error)]
      });
      return undefined;
    }
  }

  private async checkDirectory(basePath: string): Promise<string[] | undefined> {
    console.log(colorize(TEXT.DOCTOR_CHECKING_DIRECTORY, 'blue'));

    try {
      const entries = await this.reader.readDir(basePath);
      const visible = entries
        .filter(isVisibleSecretEntry)
        .map(entry => entry.name)
        .sort();
      const hidden = entries.filter(entry => isHiddenEntry(entry.name)).length;

      this.results.push({
        check: 'Secret Directory',
        status: 'OK',
        message: TEXT.DOCTOR_DIRECTORY_OK,
        details: [
          fmt('{count} visible entries', { count: visible.length }),
          fmt('{count} hidden entries', { count: hidden })
        ]
      });
      return visible;
    } catch (error) {
      this.results.push({
        check: 'Secret Directory',
        status: 'ERROR',
        message: TEXT.DOCTOR_DIRECTORY_MISSING,
        details: [sanitizeError(error)]
      });
      return undefined;
    }
  }

  private async checkSecrets(config: FrozenSecretsWatchConfig, visibleKeys: readonly string[]): Promise<void> {
    console.log(colorize(TEXT.DOCTOR_CHECKING_SECRETS, 'blue'));

    const missing = (config.secrets ?? []).filter(key => !visibleKeys.includes(key));
    if (missing.length > 0) {
      this.results.push({
        check: 'Configured Secrets',
        status: 'ERROR',
        message: TEXT.DOCTOR_SECRETS_MISSING,
        details: missing
      });
    }

    const keys = config.secrets
      ? config.secrets.filter(key => visibleKeys.includes(key))
      : visibleKeys;

    if (keys.length === 0) {
      this.results.push({
        check: 'Secret Files',
        status: 'WARN',
        message: TEXT.DOCTOR_SECRETS_NONE
      });
      return;
    }

    const empty: string[] = [];
    const unreadable: string[] = [];
    for (const key of keys) {
      try {
        const content = await this.reader.readFile(join(config.basePath, key));
        if (content.length === 0) {
          empty.push(key);
        }
      } catch (error) {
        unreadable.push(`${key}: ${sanitizeError(error)}`);
      }
    }

    if (unreadable.length > 0) {
      this.results.push({
        check: 'Secret Files',
        status: 'ERROR',
        message: TEXT.DOCTOR_SECRETS_UNREADABLE,
        details: unreadable
      });
    } else if (empty.length > 0) {
      this.results.push({
        check: 'Secret Files',
        status: 'WARN',
        message: TEXT.DOCTOR_SECRETS_EMPTY,
        details: empty
      });
    } else {
      this.results.push({
        check: 'Secret Files',
        status: 'OK',
        message: TEXT.DOCTOR_SECRETS_OK,
        details: [fmt('{count} secrets readable', { count: keys.length })]
      });
    }
  }

  private async checkWatcher(basePath: string): Promise<void> {
    console.log(colorize(TEXT.DOCTOR_CHECKING_WATCHER, 'blue'));

    try {
      const registry = await openSecretRegistry({
        basePath,
        fileReader: this.reader,
        watchSourceFactory: this.watchSourceFactory
      });
      await registry.close();
      this.results.push({
        check: 'File Watcher',
        status: 'OK',
        message: TEXT.DOCTOR_WATCHER_OK
      });
    } catch (error) {
      this.results.push({
        check: 'File Watcher',
        status: 'ERROR',
        message: TEXT.DOCTOR_WATCHER_FAILED,
        details: [sanitizeError(error)]
      });
    }
  }

  private getSummary(): DiagnosticSummary {
    return {
      total: this.results.length,
      passed: this.results.filter(r => r.status === 'OK').length,
      warnings: this.results.filter(r => r.status === 'WARN').length,
      errors: this.results.filter(r => r.status === 'ERROR').length
    };
  }

  private printSummary(summary: DiagnosticSummary): void {
    printHeader(TEXT.DOCTOR_SUMMARY);
    this.results.forEach(printResult);

    const verdict = summary.errors > 0
      ? colorize(TEXT.DOCTOR_HAS_ERRORS, 'red')
      : summary.warnings > 0
        ? colorize(TEXT.DOCTOR_HAS_WARNINGS, 'yellow')
        : colorize(TEXT.DOCTOR_ALL_PASSED, 'green');

    console.log(`\n${verdict} (${summary.passed}/${summary.total} OK, ${summary.warnings} warnings, ${summary.errors} errors)`);
  }
}
