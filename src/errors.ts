export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export type GatewayErrorKind = 'network' | 'http' | 'parse';

export class GatewayError extends Error {
  readonly kind: GatewayErrorKind;
  readonly status: number | null;

  constructor(kind: GatewayErrorKind, message: string, status?: number) {
    super(message);
    this.name = 'GatewayError';
    this.kind = kind;
    this.status = status ?? null;
  }

  /** Transport-level failures: the server was never reached. */
  get isTransport(): boolean {
    return this.kind === 'network';
  }
}

export class LocalStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LocalStoreError';
  }
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isValidEntryId(id: unknown): id is number {
  return typeof id === 'number' && Number.isInteger(id) && id > 0;
}

export function requireEntryId(id: unknown): number {
  if (!isValidEntryId(id)) {
    throw new ValidationError(`Invalid entry ID "${String(id)}"`);
  }
  return id;
}
