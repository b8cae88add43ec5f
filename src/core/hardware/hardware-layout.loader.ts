import { readFileSync } from 'fs';
import { resolve } from 'path';
import { ConfigurationError } from '../domain/errors';
import { HardwareLayout, parseHardwareLayout } from '../domain/models';

export const DEFAULT_HARDWARE_LAYOUT_PATH = 'config/hardware.json';

/**
 * Read and parse the hardware layout file. Relative paths resolve against
 * the working directory.
 */
export function loadHardwareLayout(
  path: string = DEFAULT_HARDWARE_LAYOUT_PATH,
): HardwareLayout {
  const absolutePath = resolve(process.cwd(), path);

  let contents: string;
  try {
    contents = readFileSync(absolutePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read hardware layout at ${absolutePath}: ${error instanceof Error ? error.message : String(error)}`,
      absolutePath,
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    throw new ConfigurationError(
      `Hardware layout at ${absolutePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      absolutePath,
    );
  }

  return parseHardwareLayout(raw, absolutePath);
}
