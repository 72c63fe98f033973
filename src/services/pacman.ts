import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { UpgradeCandidate } from "../types/index.js";
import { ToolUnavailableError } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";

const execFileAsync = promisify(execFile);

export interface CommandResult {
  stdout: string;
  exitCode: number;
}

/** Runs a local command; rejects with an `ENOENT` error when it is missing. */
export type CommandRunner = (command: string, args: readonly string[]) => Promise<CommandResult>;

function hasNumericCode(error: unknown): error is Error & { code: number; stdout?: unknown } {
  return error instanceof Error && "code" in error && typeof error.code === "number";
}

function isMissingCommand(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export const runCommand: CommandRunner = async (command, args) => {
  try {
    const { stdout } = await execFileAsync(command, [...args], { encoding: "utf8" });
    return { stdout, exitCode: 0 };
  } catch (error) {
    // checkupdates exits with 2 when there is nothing to update
    if (hasNumericCode(error)) {
      return {
        stdout: typeof error.stdout === "string" ? error.stdout : "",
        exitCode: error.code,
      };
    }
    throw error;
  }
};

/**
 * Parse `checkupdates` output, e.g. `automake 1.16.5-2 -> 1.17-1`.
 */
export function parseUpgradeLines(output: string): UpgradeCandidate[] {
  const candidates: UpgradeCandidate[] = [];

  for (const line of output.split("\n")) {
    const match = line.trim().match(/^(\S+)\s+(\S+)\s+->\s+(\S+)/);
    if (match && match[2] !== match[3]) {
      candidates.push({ name: match[1], currentVersion: match[2], newVersion: match[3] });
    }
  }

  return candidates;
}

/**
 * Value of the architecture field in `pacman -Qi` output. The label is
 * localized, so it comes from configuration.
 */
export function parseArchitecture(output: string, architectureWording: string): string | null {
  for (const line of output.split("\n")) {
    if (line.startsWith(architectureWording)) {
      const separator = line.indexOf(":");
      if (separator !== -1) {
        const value = line.slice(separator + 1).trim();
        return value.length > 0 ? value : null;
      }
    }
  }
  return null;
}

export class PacmanService {
  constructor(
    private readonly logger: Logger,
    private readonly architectureWording: string,
    private readonly run: CommandRunner = runCommand,
  ) {}

  /**
   * @throws ToolUnavailableError when `checkupdates` (pacman-contrib) is not installed
   */
  async getUpgradablePackages(): Promise<UpgradeCandidate[]> {
    let result: CommandResult;
    try {
      result = await this.run("checkupdates", []);
    } catch (error) {
      if (isMissingCommand(error)) {
        throw new ToolUnavailableError(
          "checkupdates",
          "Command 'checkupdates' is not available. Install the package 'pacman-contrib' to use this program.",
        );
      }
      throw error;
    }

    if (result.exitCode === 2) {
      return [];
    }
    if (result.exitCode !== 0) {
      throw new ToolUnavailableError(
        "checkupdates",
        `Command 'checkupdates' returned non-zero exit status ${result.exitCode}.`,
      );
    }

    return parseUpgradeLines(result.stdout);
  }

  /**
   * @throws ToolUnavailableError when `pacman` is not installed
   */
  async getArchitecture(packageName: string): Promise<string | null> {
    let result: CommandResult;
    try {
      result = await this.run("pacman", ["-Q", "--info", packageName]);
    } catch (error) {
      if (isMissingCommand(error)) {
        throw new ToolUnavailableError("pacman", "Command 'pacman' is not available.");
      }
      throw error;
    }

    const architecture = parseArchitecture(result.stdout, this.architectureWording);
    if (!architecture) {
      this.logger.error(
        `${packageName}: couldn't find the package architecture in the pacman output. ` +
          "If your system language is not English, set 'architectureWording' in the config file " +
          "to the label shown by 'pacman -Q --info <package>'.",
      );
      return null;
    }

    this.logger.debug(`${packageName}: package architecture ${architecture}`);
    return architecture;
  }
}
