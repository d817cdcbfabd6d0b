#!/usr/bin/env node

/**
 * fat32-inspect CLI
 * Prints the geometry of a FAT32 image and every directory entry in it
 */

import * as path from 'path';
import { ConfigurationManager } from './config/ConfigurationManager';
import { Logger } from './logging/Logger';
import { Fat32Session } from './session/Fat32Session';
import { formatInspection } from './output/RecordFormatter';
import { isFat32Error } from './errors/Fat32Error';

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

const defaultIo: CliIo = {
  out: line => process.stdout.write(`${line}\n`),
  err: line => process.stderr.write(`${line}\n`)
};

export const PROGRAM_NAME = 'fat32-inspect';

export function usage(): string {
  return `usage: ${PROGRAM_NAME} <image>`;
}

/**
 * Run the CLI and return the process exit code
 */
export function runCli(
  args: string[],
  io: CliIo = defaultIo,
  configManager: ConfigurationManager = ConfigurationManager.getInstance()
): number {
  if (args.length !== 1) {
    io.out(usage());
    return 0;
  }

  const configWithMetadata = configManager.getConfigurationWithMetadata();
  const config = configWithMetadata.config;
  const logger = new Logger(config.logLevel);

  configWithMetadata.errors.forEach(error => logger.error(`Configuration error: ${error}`));
  configWithMetadata.warnings.forEach(warning => logger.warn(`Configuration warning: ${warning}`));

  const imagePath = path.resolve(args[0]);
  try {
    const lines = Fat32Session.using(
      imagePath,
      session => formatInspection(session.inspect(), config.outputIndent),
      { previewLength: config.previewLength, slackLength: config.slackLength, logger }
    );
    lines.forEach(line => io.out(line));
    return 0;
  } catch (error) {
    if (isFat32Error(error)) {
      io.err(`fatal: ${error.describe()}`);
    } else {
      io.err(`fatal: ${error instanceof Error ? error.message : String(error)}`);
    }
    return 1;
  }
}

// Only run if this file is executed directly
if (require.main === module) {
  process.exitCode = runCli(process.argv.slice(2));
}
