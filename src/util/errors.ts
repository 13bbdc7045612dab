/**
 * Invalid stack configuration: unknown service, malformed port range, bad dependency order.
 */
export class StackConfigError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'StackConfigError';
  }
}

/**
 * An upstream service did not settle within the dependent's wait window.
 */
export class DependencyTimeoutError extends Error {
  public constructor(
    public readonly service: string,
    public readonly timeoutMs: number,
  ) {
    super(`Timed out after ${timeoutMs}ms waiting for ${service}`);
    this.name = 'DependencyTimeoutError';
  }
}

export function isAbortError(error: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted) {
    return true;
  }
  return error instanceof Error && error.name === 'AbortError';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
