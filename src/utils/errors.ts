/** Invalid or missing configuration; aborts the run. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** A required local tool (checkupdates, pacman) cannot be run; aborts the run. */
export class ToolUnavailableError extends Error {
  constructor(
    readonly command: string,
    message: string,
  ) {
    super(message);
    this.name = "ToolUnavailableError";
  }
}

/** A version string without any `-` separator. */
export class MalformedVersionError extends Error {
  constructor(readonly version: string) {
    super(`Malformed version "${version}": expected at least one "-" separator`);
    this.name = "MalformedVersionError";
  }
}

/** A package that cannot be processed; the run continues with the next one. */
export class PackageSkipError extends Error {
  constructor(
    readonly packageName: string,
    readonly reason: string,
  ) {
    super(`${packageName}: ${reason}`);
    this.name = "PackageSkipError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
