/**
 * sdfkit Host: Output Configuration
 *
 * Resolves where generation reads drivers from and writes output to:
 *
 *   1. Explicit option
 *   2. Environment: SDFKIT_SDDF, SDFKIT_OUTPUT_DIR
 *   3. Default: no sDDF path; output under `<cwd>/build`
 *
 * The resolved output directory is created if it does not exist.
 */

import { mkdirSync } from 'node:fs';
import { join, resolve } from 'node:path';

export const SDDF_ENV = 'SDFKIT_SDDF';
export const OUTPUT_DIR_ENV = 'SDFKIT_OUTPUT_DIR';

export interface OutputConfigOptions {
  readonly sddfPath?: string | undefined;
  readonly outputDir?: string | undefined;
}

export interface OutputConfig {
  /** Absolute path of the sDDF checkout, undefined when none is configured. */
  readonly sddfPath: string | undefined;
  readonly outputDir: string;
}

function pick(explicit: string | undefined, env: string): string | undefined {
  if (typeof explicit === 'string' && explicit !== '') return explicit;
  const fromEnv = process.env[env];
  return typeof fromEnv === 'string' && fromEnv !== '' ? fromEnv : undefined;
}

export function resolveOutputConfig(opts: OutputConfigOptions = {}): OutputConfig {
  const sddf = pick(opts.sddfPath, SDDF_ENV);
  const outputDir = resolve(pick(opts.outputDir, OUTPUT_DIR_ENV) ?? join(process.cwd(), 'build'));
  mkdirSync(outputDir, { recursive: true });
  return {
    sddfPath: sddf === undefined ? undefined : resolve(sddf),
    outputDir,
  };
}
