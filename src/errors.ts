/**
 * Error taxonomy for a repair run.
 *
 * FormatError, SceneIoError and ConfigError end the run. BufferBoundsError
 * and UnsupportedComponentTypeError belong to a single sampler: the repair
 * engine catches them and turns them into report entries.
 */

export class TimingRepairError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FormatError extends TimingRepairError {
  constructor(message: string, readonly path?: string) {
    super(path ? `${path}: ${message}` : message);
  }
}

export class SceneIoError extends TimingRepairError {
  constructor(message: string, readonly path: string, cause?: unknown) {
    super(`${message}: ${path}`, { cause });
  }
}

export class ConfigError extends TimingRepairError {}

export class BufferBoundsError extends TimingRepairError {
  constructor(message: string, readonly accessorIndex?: number) {
    super(message);
  }
}

export class UnsupportedComponentTypeError extends TimingRepairError {
  constructor(
    message: string,
    readonly accessorIndex: number,
    readonly componentType: number
  ) {
    super(message);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
