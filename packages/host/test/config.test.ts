/**
 * sdfkit Host: Output Configuration Tests
 *
 *   CFG-U1: explicit options win over the environment
 *   CFG-U2: SDFKIT_SDDF and SDFKIT_OUTPUT_DIR are honoured when set
 *   CFG-U3: empty values fall through; no sDDF path is the default
 *   CFG-U4: the output directory is created
 *
 * Isolation: each test saves and restores both environment variables.
 */

import { describe, it, expect, afterEach, beforeEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { OUTPUT_DIR_ENV, SDDF_ENV, resolveOutputConfig } from '../src/config.js';

// ---------------------------------------------------------------------------
// Env var save/restore helper
// ---------------------------------------------------------------------------

let savedSddf: string | undefined;
let savedOutput: string | undefined;
let dir: string;

function restore(name: string, value: string | undefined): void {
  if (value === undefined) {
    delete process.env[name];
  } else {
    process.env[name] = value;
  }
}

beforeEach(() => {
  savedSddf = process.env[SDDF_ENV];
  savedOutput = process.env[OUTPUT_DIR_ENV];
  dir = mkdtempSync(join(tmpdir(), 'sdfkit-cfg-'));
});

afterEach(() => {
  restore(SDDF_ENV, savedSddf);
  restore(OUTPUT_DIR_ENV, savedOutput);
  rmSync(dir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('resolveOutputConfig', () => {
  it('CFG-U1: prefers explicit options', () => {
    process.env[SDDF_ENV] = join(dir, 'env-sddf');
    process.env[OUTPUT_DIR_ENV] = join(dir, 'env-out');

    const config = resolveOutputConfig({ sddfPath: join(dir, 'sddf'), outputDir: join(dir, 'out') });
    expect(config).toEqual({ sddfPath: join(dir, 'sddf'), outputDir: join(dir, 'out') });
  });

  it('CFG-U2: reads both environment variables', () => {
    process.env[SDDF_ENV] = join(dir, 'env-sddf');
    process.env[OUTPUT_DIR_ENV] = join(dir, 'env-out');

    expect(resolveOutputConfig()).toEqual({ sddfPath: join(dir, 'env-sddf'), outputDir: join(dir, 'env-out') });
  });

  it('CFG-U3: treats empty strings as unset', () => {
    process.env[SDDF_ENV] = '';
    process.env[OUTPUT_DIR_ENV] = join(dir, 'env-out');

    const config = resolveOutputConfig({ sddfPath: '', outputDir: '' });
    expect(config.sddfPath).toBeUndefined();
    expect(config.outputDir).toBe(join(dir, 'env-out'));
  });

  it('CFG-U3: resolves relative paths against the working directory', () => {
    const config = resolveOutputConfig({ sddfPath: 'vendor/sddf', outputDir: join(dir, 'out') });
    expect(config.sddfPath).toBe(resolve('vendor/sddf'));
  });

  it('CFG-U4: creates the output directory', () => {
    const outputDir = join(dir, 'nested', 'build');
    expect(existsSync(outputDir)).toBe(false);
    resolveOutputConfig({ outputDir });
    expect(existsSync(outputDir)).toBe(true);
  });
});
