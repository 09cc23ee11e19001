/**
 * Persisted CLI settings: which package the tool manages.
 * Stored as `{ "pk3_file": "<archive>" }` so existing config.json files keep working.
 */
import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError, describeError } from './errors.js';
import { formatZodError } from './config.js';

export const DEFAULT_SETTINGS_FILE = 'config.json';

const settingsFileSchema = z.object({
  pk3_file: z.string().refine(s => s.trim().length > 0, { message: 'pk3_file must be a non-empty string' }),
});

export interface Settings {
  readonly archivePath: string;
}

const isMissing = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * @returns The stored settings, or null when the file does not exist
 * @throws {ConfigError} If the file exists but cannot be read or is invalid
 */
export async function loadSettings(filePath: string): Promise<Settings | null> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissing(error)) return null;
    throw new ConfigError(`Error reading config file '${filePath}': ${describeError(error)}`, error);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file '${filePath}' is not valid JSON: ${describeError(error)}`, error);
  }

  const parsed = settingsFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Config file '${filePath}' is invalid:\n${formatZodError(parsed.error)}`, parsed.error);
  }
  return { archivePath: parsed.data.pk3_file };
}

export async function saveSettings(filePath: string, settings: Settings): Promise<void> {
  const parsed = settingsFileSchema.safeParse({ pk3_file: settings.archivePath });
  if (!parsed.success) {
    throw new ConfigError(`Refusing to save invalid settings:\n${formatZodError(parsed.error)}`, parsed.error);
  }
  try {
    await writeFile(filePath, JSON.stringify(parsed.data), 'utf8');
  } catch (error) {
    throw new ConfigError(`Error saving config file '${filePath}': ${describeError(error)}`, error);
  }
}
