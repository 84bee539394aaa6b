/**
 * @sdfkit/core
 *
 * System description model for Microkit systems: protection domains,
 * memory regions, channels and virtual machines, the sDDF device-class
 * subsystems and file system and VMM composites built on them, the XML
 * renderer and the configuration blob encoders.
 *
 * This package performs no I/O. Blobs go to an injected BlobSink and log
 * entries to an injected LogSink; concrete implementations live in
 * @sdfkit/host.
 */

import type { BlockSystem } from './sddf/block.js';
import type { GpuSystem } from './sddf/gpu.js';
import type { I2cSystem } from './sddf/i2c.js';
import type { FatFileSystem, NfsFileSystem } from './lionsos/filesystem.js';
import type { NetSystem } from './sddf/net.js';
import type { SerialSystem } from './sddf/serial.js';
import type { TimerSystem } from './sddf/timer.js';
import type { VirtualMachineMonitor } from './vmm/vmm.js';

// Types
export { ErrorKind, fail, ok } from './types/result.js';
export type { Result, SystemError } from './types/result.js';
export {
  Arch,
  PageSize,
  SMALL_PAGE,
  hex,
  is64Bit,
  isAligned,
  pageBytes,
  parseArch,
  roundDown,
  roundUp,
} from './types/arch.js';

// Entity graph
export {
  DEFAULT_PRIORITY,
  MAX_PRIORITY,
  MAX_STACK_SIZE,
  MIN_STACK_SIZE,
} from './graph/attributes.js';
export type { Schedule } from './graph/attributes.js';
export { Channel } from './graph/channel.js';
export type { ChannelOptions, ChannelSide } from './graph/channel.js';
export { IdAllocator, MAX_IDS } from './graph/id-allocator.js';
export { IrqTrigger, parseTrigger } from './graph/irq.js';
export type { Irq, IrqOptions } from './graph/irq.js';
export { MemoryMap, MemoryRegion, formatPerms, parsePerms } from './graph/memory-region.js';
export type { MapOptions, MemoryRegionOptions, Perms } from './graph/memory-region.js';
export { ProtectionDomain } from './graph/protection-domain.js';
export type { ChildPd, PdOptions } from './graph/protection-domain.js';
export { VirtualMachine } from './graph/virtual-machine.js';
export type { MapTarget, Vcpu, VmOptions } from './graph/virtual-machine.js';

// System description
export { MAP_VADDR_BASE, SystemDescription } from './system/system-description.js';
export type { SystemDescriptionOptions } from './system/system-description.js';
export { Wiring } from './system/wiring.js';
export type { MappedRegion, WiringMapOptions } from './system/wiring.js';

// Rendering
export { escapeXml, renderSystem } from './render/system-writer.js';
export { loadSystem, parseSystemDocument } from './render/document-reader.js';
export type {
  DocChannel,
  DocChannelEnd,
  DocIrq,
  DocMap,
  DocMemoryRegion,
  DocProtectionDomain,
  DocVcpu,
  DocVirtualMachine,
  SystemDocument,
} from './render/document-reader.js';

// Logging (sink interface; implementations live in @sdfkit/host)
export { GenerationLogger } from './logging/generation-log.js';
export { LogLevel } from './logging/log-sink.js';
export type { GenerationLogEntry, LogContext, LogSink } from './logging/log-sink.js';

// Device tree collaborator
export { isEnabled } from './dtb/device-tree.js';
export type { DeviceInterrupt, DeviceNode, DeviceRegister, DeviceTree } from './dtb/device-tree.js';

// sDDF
export { DeviceClass, DriverCatalog, parseDriverConfig } from './sddf/driver-catalog.js';
export type { DriverConfig, DriverEntry, DriverIrq, DriverRegion } from './sddf/driver-catalog.js';
export { bindDevice } from './sddf/driver.js';
export { SubsystemBase, SubsystemState, blobName } from './sddf/subsystem.js';
export type { BlobSink, ConfigBlob } from './sddf/subsystem.js';
export { TimerSystem } from './sddf/timer.js';
export type { TimerClient, TimerSystemOptions } from './sddf/timer.js';
export { SerialSystem } from './sddf/serial.js';
export type { SerialClient, SerialOptions, SerialSystemOptions } from './sddf/serial.js';
export { I2cSystem } from './sddf/i2c.js';
export type { I2cClient, I2cOptions, I2cSystemOptions } from './sddf/i2c.js';
export { QueueSystem } from './sddf/queue-system.js';
export type { QueueClient, QueueSystemOptions } from './sddf/queue-system.js';
export { BlockSystem } from './sddf/block.js';
export type { BlockClientOptions } from './sddf/block.js';
export { GpuSystem } from './sddf/gpu.js';
export type { GpuClientOptions } from './sddf/gpu.js';
export { NET_BUFFER_SIZE, NetSystem } from './sddf/net.js';
export type { NetClient, NetClientOptions, NetOptions, NetSystemOptions } from './sddf/net.js';
export { formatMac, generateMac, parseMac } from './sddf/mac.js';
export type { MacInput } from './sddf/mac.js';

// Composites
export { FatFileSystem, FileSystem, NfsFileSystem } from './lionsos/filesystem.js';
export type { FatOptions, FsClient, FsOptions, NfsOptions } from './lionsos/filesystem.js';
export {
  DEFAULT_GUEST_RAM_PADDR,
  DEFAULT_GUEST_RAM_SIZE,
  VirtualMachineMonitor,
} from './vmm/vmm.js';
export type { PassthroughDevice, VmmOptions } from './vmm/vmm.js';

// Config blob layouts
export { MAX_CLIENTS } from './config/common.js';
export { StructWriter } from './config/struct-writer.js';

/** Any subsystem the generator can connect and serialise. */
export type Subsystem =
  | TimerSystem
  | SerialSystem
  | I2cSystem
  | BlockSystem
  | GpuSystem
  | NetSystem
  | FatFileSystem
  | NfsFileSystem
  | VirtualMachineMonitor;
