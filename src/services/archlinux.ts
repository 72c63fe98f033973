import { z } from "zod";
import type { RegistryPackage } from "../types/index.js";
import {
  ResilientClient,
  sendWithFetch,
  type FetchLike,
  type RawResponse,
  type ResilientClientOptions,
} from "./http-client.js";

const searchResultSchema = z.object({
  pkgname: z.string(),
  pkgbase: z.string().nullish(),
  repo: z.string(),
  arch: z.string(),
  pkgdesc: z.string().nullish(),
  url: z.string().nullish(),
});

const searchResponseSchema = z.object({
  results: z.array(searchResultSchema).default([]),
});

export type RegistryLookup =
  | { found: true; package: RegistryPackage }
  | { found: false; reason: string };

export interface ArchLinuxClientOptions extends ResilientClientOptions {
  fetch?: FetchLike;
}

/**
 * Anonymous access to the archlinux.org package search API.
 */
export class ArchLinuxClient extends ResilientClient {
  protected readonly platform = "ArchLinux";
  protected readonly baseUrl = "https://archlinux.org";
  private readonly fetchImpl: FetchLike;

  constructor(options: ArchLinuxClientOptions) {
    super(options);
    this.fetchImpl = options.fetch ?? fetch;
  }

  protected send(url: string): Promise<RawResponse> {
    return sendWithFetch(this.fetchImpl, url, this.timeoutMs, { Accept: "application/json" }, "json");
  }

  /**
   * Registry record of a package in exactly one of the enabled repositories.
   * Packages built for `any` match every architecture.
   */
  async lookup(
    packageName: string,
    architecture: string,
    enabledRepositories: readonly string[],
  ): Promise<RegistryLookup> {
    const result = await this.fetchJson("packages/search/json/", searchResponseSchema, {
      name: packageName,
    });

    if (!result.ok) {
      return { found: false, reason: `registry lookup failed: ${result.error.message}` };
    }

    const matches = result.data.results.filter(
      (entry) =>
        entry.pkgname === packageName &&
        enabledRepositories.includes(entry.repo) &&
        (entry.arch === architecture || entry.arch === "any"),
    );

    const repositories = [...new Set(matches.map((entry) => entry.repo))];

    if (repositories.length === 0) {
      return {
        found: false,
        reason: `not found in the enabled repositories (${enabledRepositories.join(", ")})`,
      };
    }

    if (repositories.length > 1) {
      return {
        found: false,
        reason: `found in multiple repositories (${repositories.join(", ")}); enable either the stable or the testing repositories`,
      };
    }

    const [entry] = matches;
    return {
      found: true,
      package: {
        name: entry.pkgname,
        base: entry.pkgbase && entry.pkgbase !== entry.pkgname ? entry.pkgbase : null,
        description: entry.pkgdesc ?? "",
        upstreamUrl: entry.url ?? "",
        repository: entry.repo,
        architecture: entry.arch,
      },
    };
  }
}
