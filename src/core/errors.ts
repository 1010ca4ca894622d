import type { AssetId } from "@core/pipelines/shared";

export type DeclarationErrorReason = "missing-attribute" | "unknown-kind" | "invalid-attribute";

/** A placeholder element that cannot be turned into an asset pipeline. */
export class AssetDeclarationError extends Error {
  readonly reason: DeclarationErrorReason;

  constructor(reason: DeclarationErrorReason, message: string) {
    super(message);
    this.name = "AssetDeclarationError";
    this.reason = reason;
  }
}

/** A referenced path that does not canonicalize to a usable file. */
export class AssetResolutionError extends Error {
  readonly path: string;

  constructor(message: string, filePath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AssetResolutionError";
    this.path = filePath;
  }
}

export class AssetIoError extends Error {
  readonly path: string;

  constructor(message: string, filePath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AssetIoError";
    this.path = filePath;
  }
}

export class AssetEncodingError extends Error {
  readonly path: string;

  constructor(filePath: string, options?: { cause?: unknown }) {
    super(`file is not valid UTF-8 ${JSON.stringify(filePath)}`, options);
    this.name = "AssetEncodingError";
    this.path = filePath;
  }
}

/**
 * Failure of a single asset, either while its pipeline was being constructed
 * or while its worker ran. The underlying error is kept as `cause`.
 */
export class AssetBuildError extends Error {
  readonly assetId: AssetId;

  constructor(assetId: AssetId, cause: unknown, label?: string) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`asset #${assetId}${label ? ` (${label})` : ""} failed: ${detail}`, { cause });
    this.name = "AssetBuildError";
    this.assetId = assetId;
  }
}

/** Every failure of one build pass, in the order they were observed. */
export class AssetBuildFailure extends AggregateError {
  declare readonly errors: AssetBuildError[];

  constructor(errors: AssetBuildError[]) {
    const first = errors[0]?.message ?? "unknown failure";
    const suffix = errors.length > 1 ? ` (and ${errors.length - 1} more)` : "";
    super(errors, `${first}${suffix}`);
    this.name = "AssetBuildFailure";
  }
}
