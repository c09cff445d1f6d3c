#!/usr/bin/env node

import { CONFIG } from './constants/config-constants.js';
import { TEXT } from './constants/text-constants.js';
import { writeError } from './utils/logging.js';
import { sanitizeError } from './utils/security.js';

export { openSecretRegistry, FileSecretRegistry } from './services/file-secret-registry.js';
export type { SecretRegistryOptions } from './services/file-secret-registry.js';
export { FileSecret } from './services/file-secret.js';
export { FsFileReader } from './services/fs-file-reader.js';
export { ChokidarWatchSource, ChokidarWatchSourceFactory } from './services/chokidar-watch-source.js';
export { ConfigLoaderService } from './services/config-loader.service.js';
export type { Secret, SecretRegistry } from './interfaces/secret.interface.js';
export type { FileReader, FileStat, DirEntry } from './interfaces/file-reader.interface.js';
export type { WatchSource, WatchSourceFactory, WatchEvent, WatchOperation } from './interfaces/watch-source.interface.js';
export { Channel } from './utils/channel.js';
export type { ReadonlyChannel, ChannelResult } from './utils/channel.js';
export {
  SecretsError,
  ValidationError,
  ConfigurationError,
  SecretNotFoundError,
  SecretReadError,
  SecretClosedError,
  RegistryClosedError,
  WatchActivationError,
  WatchError
} from './utils/errors.js';
export { setLogLevel } from './utils/logging.js';

async function main(args: readonly string[]): Promise<void> {
  const [command, configPath] = args;

  if (command === CONFIG.CLI_COMMAND_DOCTOR) {
    const { DoctorCLI } = await import('./cli/doctor.js');
    await new DoctorCLI(configPath).run();
    return;
  }

  if (command === CONFIG.CLI_COMMAND_WATCH) {
    const { WatchCLI } = await import('./cli/watch.js');
    await new WatchCLI(configPath).run();
    return;
  }

  if (command === CONFIG.CLI_ARG_VERSION_LONG) {
    console.log(`${CONFIG.PACKAGE_NAME} ${CONFIG.VERSION}`);
    return;
  }

  console.log(TEXT.CLI_USAGE);
  const askedForHelp = command === CONFIG.CLI_ARG_HELP_LONG || command === CONFIG.CLI_ARG_HELP_SHORT;
  process.exit(askedForHelp ? CONFIG.EXIT_CODE_SUCCESS : CONFIG.EXIT_CODE_ERROR);
}

if (import.meta.url === `${CONFIG.FILE_URL_SCHEME}${process.argv[1]}`) {
  const args = process.argv.slice(2);
  main(args).catch((error: unknown) => {
    const failure = args[0] === CONFIG.CLI_COMMAND_DOCTOR ? TEXT.DOCTOR_CLI_FAILED : TEXT.WATCH_CLI_FAILED;
    writeError(failure, {
      level: CONFIG.LOG_LEVEL_ERROR,
      error: sanitizeError(error)
    });
    process.exit(CONFIG.EXIT_CODE_ERROR);
  });
}

export { main };
