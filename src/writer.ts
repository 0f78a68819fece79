import { mkdir, readdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import type { GeneratedArtifact } from './types.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { GeneratorError } from './errors.js';

export interface WriteOptions {
  /** Format every unit with Prettier before writing */
  pretty?: boolean;
  logger?: Logger;
}

/**
 * Formats generated code with Prettier
 *
 * Prettier is loaded on demand. When it cannot be loaded the code is returned
 * unchanged and a warning is logged; a formatting failure aborts the run.
 *
 * @param artifacts - Units to format
 * @param logger - Receives the warning when Prettier is unavailable
 * @returns Formatted units, in the same order
 */
export async function formatArtifacts(
  artifacts: readonly GeneratedArtifact[],
  logger: Logger = silentLogger
): Promise<GeneratedArtifact[]> {
  let prettier: typeof import('prettier');
  try {
    prettier = await import('prettier');
  } catch (error) {
    logger.warn(`Prettier is not available, writing unformatted code: ${error instanceof Error ? error.message : String(error)}`);
    return [...artifacts];
  }

  const formatted: GeneratedArtifact[] = [];
  for (const artifact of artifacts) {
    try {
      const code = await prettier.format(artifact.code, {
        parser: 'typescript',
        singleQuote: true,
        semi: true,
        trailingComma: 'es5',
        printWidth: 100,
      });
      formatted.push({ path: artifact.path, code });
    } catch (error) {
      throw new GeneratorError(
        `Failed to format ${artifact.path}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
  return formatted;
}

/**
 * Removes every file directly inside a directory. Subdirectories are kept.
 */
async function clearFiles(outputDir: string, logger: Logger): Promise<void> {
  const entries = await readdir(outputDir, { withFileTypes: true });
  for (const entry of entries) {
    if (entry.isFile()) {
      await rm(join(outputDir, entry.name));
      logger.debug(`Removed: ${join(outputDir, entry.name)}`);
    }
  }
}

/**
 * Writes a generated set to the file system
 *
 * Formatting happens before anything on disk changes, so a failure leaves the
 * previous set in place. The stale files of the output directory are then
 * removed and every unit is written.
 *
 * @param outputDir - Output directory, created when missing
 * @param artifacts - Units returned by the generator
 * @param options - Writer options
 */
export async function writeArtifacts(
  outputDir: string,
  artifacts: readonly GeneratedArtifact[],
  options: WriteOptions = {}
): Promise<void> {
  const logger = options.logger ?? silentLogger;
  const units = options.pretty ? await formatArtifacts(artifacts, logger) : artifacts;

  await mkdir(outputDir, { recursive: true });
  await clearFiles(outputDir, logger);

  for (const unit of units) {
    const filePath = join(outputDir, unit.path);
    await writeFile(filePath, unit.code, 'utf-8');
    logger.debug(`Generated: ${filePath}`);
  }
}
