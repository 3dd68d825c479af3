export type ErrorKind = "not-found" | "resolution" | "transfer" | "format" | "filesystem" | "config";

export type NotFoundReason = "latest" | "aliased" | "no-alias-default";

/**
 * Base class for every failure the toolchain engine reports. Nothing is retried:
 * these bubble up to the command entry point, which prints the message and exits non-zero.
 */
export class PawnupError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PawnupError";
    this.kind = kind;
  }
}

/** A selector resolved, but no matching toolchain is installed locally. */
export class NotFoundError extends PawnupError {
  readonly reason: NotFoundReason;
  readonly version: string;
  readonly alias?: string;

  constructor(reason: NotFoundReason, version: string, alias?: string) {
    super("not-found", NotFoundError.describe(reason, version, alias));
    this.name = "NotFoundError";
    this.reason = reason;
    this.version = version;
    this.alias = alias;
  }

  private static describe(reason: NotFoundReason, version: string, alias?: string): string {
    switch (reason) {
      case "latest":
        return `latest toolchain compatible with version ${version} was not found`;
      case "aliased":
        return `version ${version} (as specified by alias "${alias}") was not found`;
      case "no-alias-default":
        return `alias "${version}" has no default version set`;
    }
  }
}

/** No remote branch or version qualifies for a selector, or an alias is undefined. */
export class ResolutionError extends PawnupError {
  readonly selector: string;
  readonly alias?: string;

  constructor(message: string, selector: string, alias?: string) {
    super("resolution", message);
    this.name = "ResolutionError";
    this.selector = selector;
    this.alias = alias;
  }
}

export class TransferError extends PawnupError {
  readonly url: string;

  constructor(message: string, url: string, options?: { cause?: unknown }) {
    super("transfer", `${message} (${url})`, options);
    this.name = "TransferError";
    this.url = url;
  }
}

export class FormatError extends PawnupError {
  readonly source: string;

  constructor(message: string, source: string, options?: { cause?: unknown }) {
    super("format", `${message} (${source})`, options);
    this.name = "FormatError";
    this.source = source;
  }
}

export class FilesystemError extends PawnupError {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super("filesystem", `${message} ${path}: ${describeCause(options?.cause)}`, options);
    this.name = "FilesystemError";
    this.path = path;
  }
}

export class ConfigError extends PawnupError {
  readonly path: string | null;

  constructor(message: string, path: string | null, options?: { cause?: unknown }) {
    super("config", path ? `${message} ${path}: ${describeCause(options?.cause)}` : message, options);
    this.name = "ConfigError";
    this.path = path;
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return cause === undefined ? "unknown error" : String(cause);
}
