import { Stats } from 'fs';
import { stat } from 'fs/promises';
import { describeError } from '../common/utils/error.utils';
import { CliUsageError } from './errors/cli-usage.error';
import { InvalidRootError } from './errors/invalid-root.error';

/**
 * Return the single directory argument.
 */
export function parseArguments(args: readonly string[]): string {
  if (args.length !== 1) {
    throw new CliUsageError();
  }
  return args[0];
}

/**
 * Check that `root` exists and is a directory.
 */
export async function assertDirectory(root: string): Promise<void> {
  let stats: Stats;
  try {
    stats = await stat(root);
  } catch (error) {
    throw new InvalidRootError(root, describeError(error), { cause: error });
  }

  if (!stats.isDirectory()) {
    throw new InvalidRootError(root, `${root} is not a directory`);
  }
}
