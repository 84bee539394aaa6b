/**
 * @sdfkit/host
 *
 * Node.js side of sdfkit: file-backed implementations of the core's
 * injection points, the sDDF driver probe, document output and output
 * configuration. All file system access in the project lives here.
 */

export { FileOutputIO, MemoryOutputIO } from './output/output-io.js';
export type { OutputIO } from './output/output-io.js';
export { FileLogSink, GENERATION_LOG, MemoryLogSink } from './logging/file-log-sink.js';
export { createUlidFactory, ulid } from './logging/ulid.js';
export type { UlidSources } from './logging/ulid.js';
export { DRIVER_CONFIG, probeDrivers } from './drivers/probe.js';
export { OUTPUT_DIR_ENV, SDDF_ENV, resolveOutputConfig } from './config.js';
export type { OutputConfig, OutputConfigOptions } from './config.js';
export { writeChannelHeaders, writeSystemDocument } from './document.js';
export type { WriteDocumentOptions } from './document.js';
