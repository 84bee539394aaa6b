/**
 * sdfkit Core: Results and Errors
 *
 * Every fallible operation in the core returns a Result. Validation never
 * throws; the caller receives a typed SystemError and the graph is left
 * exactly as it was before the call.
 */

// ---------------------------------------------------------------------------
// Error Kinds
// ---------------------------------------------------------------------------

export enum ErrorKind {
  /** A PD or MR was registered under a name already present. */
  DuplicateName = 'duplicate_name',
  /** A PD (or a class-specific key such as a MAC address) is already a client. */
  DuplicateClient = 'duplicate_client',
  /** The PD is also the driver, virtualiser or copier of the same subsystem. */
  InvalidClient = 'invalid_client',
  /** A MAC, physical or virtual address failed its format or alignment rule. */
  InvalidAddress = 'invalid_address',
  /** A child-PD or VM relation would create a cycle or a second VM. */
  StructuralCycle = 'structural_cycle',
  /** No unused local id remains in the id space. */
  IdExhausted = 'id_exhausted',
  /** A requested fixed id is already in use. */
  IdConflict = 'id_conflict',
  /** Operation attempted out of lifecycle order. */
  InvalidState = 'invalid_state',
  /** A blob or document could not be written. */
  IOFailure = 'io_failure',
  /** A value is out of range, malformed or otherwise unusable. */
  InvalidArgument = 'invalid_argument',
  /** A destroyed or foreign entity was referenced. */
  UnknownEntity = 'unknown_entity',
  /** A device node cannot be bound to any known driver. */
  InvalidDevice = 'invalid_device',
  /** A driver catalog entry is malformed. */
  InvalidConfig = 'invalid_config',
  /** The target architecture is unknown or lacks the requested feature. */
  UnsupportedArch = 'unsupported_arch',
}

export interface SystemError {
  readonly kind: ErrorKind;
  readonly message: string;
  /** Optional detail, e.g. the entity or subsystem involved. */
  readonly context?: string | undefined;
}

/**
 * Outcome of a fallible operation. Check `ok` before reading `value`.
 */
export type Result<T = void> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: SystemError };

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

/** Successful result, with or without a value. */
export function ok(): Result<void>;
export function ok<T>(value: T): Result<T>;
export function ok(value?: unknown): Result<unknown> {
  return { ok: true, value };
}

/**
 * Failed result.
 *
 * @param context - entity or subsystem the failure concerns, when the
 *                  message alone does not name it
 */
export function fail<T = never>(
  kind: ErrorKind,
  message: string,
  context?: string,
): Result<T> {
  return { ok: false, error: { kind, message, context } };
}
