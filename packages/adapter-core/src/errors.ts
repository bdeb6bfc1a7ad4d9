export class ChannelResolutionError extends Error {
  readonly reference: string;

  constructor(reference: string, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : cause !== undefined ? String(cause) : "not found";
    super(`Cannot resolve channel "${reference}": ${detail}`, { cause });
    this.name = "ChannelResolutionError";
    this.reference = reference;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
