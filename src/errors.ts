// src/errors.ts
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Bad flags or environment; raised before any file is touched. */
export class ConfigError extends Error {
  public override readonly name = "ConfigError";
}

/** remove.bg answered with a status that will not improve by moving to the next file. */
export class RemoveBgHttpError extends Error {
  public override readonly name = "RemoveBgHttpError";

  public constructor(
    public readonly status: number,
    public readonly detail: string,
  ) {
    super(`remove.bg HTTP ${status}${detail ? `: ${detail}` : ""}`);
  }
}
