/**
 * sdfkit Host: sDDF Driver Probe
 *
 * Walks an sDDF checkout and builds the driver catalog from every
 * `drivers/<class>/<driver>/config.json`. Block drivers also live one
 * level down under `drivers/blk/mmc`. A driver directory without a
 * config.json is skipped; a missing class directory is an IO failure.
 */

import { readFileSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import {
  DeviceClass,
  DriverCatalog,
  ErrorKind,
  fail,
  parseDriverConfig,
  type DriverEntry,
  type GenerationLogger,
  type Result,
} from '@sdfkit/core';
import { isNodeError } from '../output/output-io.js';

export const DRIVER_CONFIG = 'config.json';

const CLASS_DIRS: ReadonlyArray<readonly [DeviceClass, ReadonlyArray<string>]> = [
  [DeviceClass.Network, ['network']],
  [DeviceClass.Serial, ['serial']],
  [DeviceClass.Timer, ['timer']],
  [DeviceClass.Blk, ['blk', 'blk/mmc']],
  [DeviceClass.I2c, ['i2c']],
  [DeviceClass.Gpu, ['gpu']],
];

function reason(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function probeDrivers(sddfPath: string, log?: GenerationLogger): Result<DriverCatalog> {
  const entries: DriverEntry[] = [];

  for (const [deviceClass, dirs] of CLASS_DIRS) {
    for (const dir of dirs) {
      const classDir = join(sddfPath, 'drivers', dir);
      let names: string[];
      try {
        names = readdirSync(classDir, { withFileTypes: true })
          .filter((d) => d.isDirectory())
          .map((d) => d.name)
          .sort();
      } catch (err: unknown) {
        return fail(ErrorKind.IOFailure, `cannot read driver directory '${classDir}': ${reason(err)}`);
      }

      for (const name of names) {
        const configPath = join(classDir, name, DRIVER_CONFIG);
        let text: string;
        try {
          text = readFileSync(configPath, 'utf-8');
        } catch (err: unknown) {
          if (isNodeError(err, 'ENOENT')) continue;
          return fail(ErrorKind.IOFailure, `cannot read '${configPath}': ${reason(err)}`);
        }
        let raw: unknown;
        try {
          raw = JSON.parse(text);
        } catch (err: unknown) {
          return fail(ErrorKind.InvalidConfig, `'${configPath}' is not valid JSON: ${reason(err)}`);
        }
        const config = parseDriverConfig(raw, configPath);
        if (!config.ok) return config;
        entries.push({ deviceClass, name, config: config.value });
        log?.debug('driver.probed', `found ${deviceClass} driver '${name}'`, { class: deviceClass, driver: name });
      }
    }
  }

  return DriverCatalog.create(entries);
}
