/**
 * File replacement protocol shared by strip and restore.
 *
 * The file being replaced is renamed to a holding path first and only deleted
 * once the replacement sits at the target path, so at every step one complete
 * copy exists under a known name.
 */
import { access, rename, rm } from 'node:fs/promises';
import { HOLDING_SUFFIX } from './constants/exclusion-prefixes.js';
import { IoError, describeError } from './errors.js';
import type { SwapWarning } from './types/results.js';

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

export function holdingPathFor(target: string): string {
  return `${target}${HOLDING_SUFFIX}`;
}

export interface SwapOutcome {
  /** Whether something was at the target path before the swap. */
  readonly replacedExisting: boolean;
  readonly warnings: readonly SwapWarning[];
}

/**
 * Moves `replacement` to `target`, replacing whatever is there.
 *
 * @throws {IoError} If a holding file is already present, the target cannot be
 *   moved aside, or the replacement cannot be moved in (the target is put back)
 */
export async function swapFile(target: string, replacement: string): Promise<SwapOutcome> {
  const holding = holdingPathFor(target);
  const warnings: SwapWarning[] = [];

  if (await pathExists(holding)) {
    throw new IoError(
      `'${holding}' is left over from an interrupted operation and may be the only copy of '${target}'. ` +
      `Move or delete it before retrying.`,
      holding
    );
  }

  const replacedExisting = await pathExists(target);
  if (replacedExisting) {
    try {
      await rename(target, holding);
    } catch (error) {
      throw new IoError(`Error moving '${target}' aside: ${describeError(error)}`, target, error);
    }
  }

  try {
    await rename(replacement, target);
  } catch (error) {
    if (replacedExisting) {
      try {
        await rename(holding, target);
      } catch (rollbackError) {
        throw new IoError(
          `Error moving '${replacement}' to '${target}': ${describeError(error)}. ` +
          `The previous file could not be put back and remains at '${holding}': ${describeError(rollbackError)}`,
          target,
          error
        );
      }
    }
    throw new IoError(`Error moving '${replacement}' to '${target}': ${describeError(error)}`, target, error);
  }

  if (replacedExisting) {
    try {
      await rm(holding, { force: true });
    } catch (error) {
      const message = `Replaced file left at '${holding}': ${describeError(error)}`;
      console.warn(`⚠️  ${message}`);
      warnings.push({ code: 'holding-file-left', path: holding, message });
    }
  }

  return { replacedExisting, warnings };
}
