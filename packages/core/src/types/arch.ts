/**
 * sdfkit Core: Target Architectures and Page Sizes
 */

export enum Arch {
  Aarch32 = 'aarch32',
  Aarch64 = 'aarch64',
  Riscv32 = 'riscv32',
  Riscv64 = 'riscv64',
  X86 = 'x86',
  X86_64 = 'x86_64',
}

export enum PageSize {
  Small = 'small',
  Large = 'large',
  Huge = 'huge',
}

export const SMALL_PAGE = 0x1000;

export function is64Bit(arch: Arch): boolean {
  return arch === Arch.Aarch64 || arch === Arch.Riscv64 || arch === Arch.X86_64;
}

/**
 * Size in bytes of a page class on the given architecture, or undefined when
 * the architecture has no such page (huge pages on 32-bit targets).
 */
export function pageBytes(arch: Arch, size: PageSize): number | undefined {
  switch (size) {
    case PageSize.Small:
      return SMALL_PAGE;
    case PageSize.Large:
      return is64Bit(arch) ? 0x200000 : 0x400000;
    case PageSize.Huge:
      return is64Bit(arch) ? 0x40000000 : undefined;
  }
}

export function isAligned(value: number, alignment: number): boolean {
  return value % alignment === 0;
}

export function roundUp(value: number, alignment: number): number {
  const rem = value % alignment;
  return rem === 0 ? value : value + (alignment - rem);
}

export function roundDown(value: number, alignment: number): number {
  return value - (value % alignment);
}

/** Lower-case hex with a 0x prefix, as used throughout the rendered document. */
export function hex(value: number): string {
  return `0x${value.toString(16)}`;
}

export function parseArch(value: string): Arch | undefined {
  return Object.values(Arch).find((a) => a === value);
}
