/**
 * ZFS Command Client
 *
 * Thin wrapper around the zfs(8) binary. Every call is awaited before the
 * next one is issued; there is no timeout or retry layer.
 *
 * Note: read() always passes -H, so zfs prints tab-separated rows without a
 * header. run() is for commands with side effects (snapshot, destroy, set).
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { config } from '../config';
import { logger } from '../config/logger';
import { SubsystemError } from '../errors';

const execFileAsync = promisify(execFile);

export type ZfsRow = string[];

/**
 * The subset of the client the repositories depend on.
 */
export interface ZfsCommandRunner {
  read(action: string, args: readonly string[]): Promise<ZfsRow[]>;
  run(action: string, args: readonly string[]): Promise<void>;
}

export interface ZfsClientOptions {
  binary: string;
}

interface ExecFailure {
  code?: number | string;
  stderr?: string;
}

function isExecFailure(error: unknown): error is Error & ExecFailure {
  return error instanceof Error && ('code' in error || 'stderr' in error);
}

export function parseRows(stdout: string): ZfsRow[] {
  return stdout
    .split('\n')
    .filter((line) => line !== '')
    .map((line) => line.split('\t'));
}

export class ZfsClient implements ZfsCommandRunner {
  constructor(private options: ZfsClientOptions) {}

  async read(action: string, args: readonly string[]): Promise<ZfsRow[]> {
    const stdout = await this.exec([action, '-H', ...args]);
    return parseRows(stdout);
  }

  async run(action: string, args: readonly string[]): Promise<void> {
    await this.exec([action, ...args]);
  }

  private async exec(args: string[]): Promise<string> {
    logger.debug('ZfsClient: Executing', { binary: this.options.binary, args });

    try {
      const { stdout } = await execFileAsync(this.options.binary, args, {
        encoding: 'utf8',
        maxBuffer: 64 * 1024 * 1024,
      });
      return stdout;
    } catch (error) {
      if (isExecFailure(error)) {
        const exitCode = typeof error.code === 'number' ? error.code : null;
        throw new SubsystemError(args, exitCode, error.stderr ?? error.message, { cause: error });
      }
      throw new SubsystemError(args, null, String(error), { cause: error });
    }
  }
}

export const zfs = new ZfsClient({ binary: config.zfs.binary });
