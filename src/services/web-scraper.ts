import * as cheerio from "cheerio";
import {
  ResilientClient,
  sendWithFetch,
  type FetchLike,
  type RawResponse,
  type ResilientClientOptions,
} from "./http-client.js";
import type { CommitInfo } from "../types/index.js";

const DEFAULT_USER_AGENT = "Mozilla/5.0 (compatible; arch-changelog-tracker/1.0)";

export interface WebScraperOptions extends ResilientClientOptions {
  /** Pause before every page request */
  requestDelayMs?: number;
  fetch?: FetchLike;
  userAgent?: string;
}

export interface ScrapedLink {
  text: string;
  href: string;
}

/**
 * Fetches HTML pages for hosts without a usable API (cgit, apps.kde.org).
 */
export class WebScraper extends ResilientClient {
  protected readonly platform = "Web";
  protected readonly baseUrl = "";
  private readonly fetchImpl: FetchLike;
  private readonly requestDelayMs: number;
  private readonly userAgent: string;

  constructor(options: WebScraperOptions) {
    super(options);
    this.fetchImpl = options.fetch ?? fetch;
    this.requestDelayMs = options.requestDelayMs ?? 0;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  }

  protected send(url: string): Promise<RawResponse> {
    return sendWithFetch(
      this.fetchImpl,
      url,
      this.timeoutMs,
      {
        "User-Agent": this.userAgent,
        Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      },
      "text",
    );
  }

  async fetchPage(url: string): Promise<string | null> {
    if (this.requestDelayMs > 0) {
      await this.sleep(this.requestDelayMs);
    }

    const result = await this.fetchRaw(url);
    if (!result.ok) {
      return null;
    }
    const body = result.data.body;
    return typeof body === "string" ? body : null;
  }

  /**
   * First link whose `href` matches `pattern`, resolved against `pageUrl`.
   */
  static findLink(html: string, pageUrl: string, pattern: RegExp): ScrapedLink | null {
    const $ = cheerio.load(html);
    for (const element of $("a[href]").toArray()) {
      const href = $(element).attr("href");
      if (href && pattern.test(href)) {
        return { text: $(element).text().trim(), href: new URL(href, pageUrl).toString() };
      }
    }
    return null;
  }

  /**
   * Commits listed on a cgit log page between the row decorated with `newTag`
   * (inclusive) and the row decorated with `oldTag` (exclusive), newest first.
   */
  static extractCgitCommits(
    html: string,
    pageUrl: string,
    newTag: string,
    oldTag: string,
  ): CommitInfo[] {
    const $ = cheerio.load(html);
    const commits: CommitInfo[] = [];
    let collecting = false;

    for (const element of $("tr").toArray()) {
      const row = $(element);
      const hasTag = (tag: string): boolean =>
        row
          .find("*")
          .toArray()
          .some((node) => $(node).children().length === 0 && $(node).text().trim() === tag);

      if (!collecting && hasTag(newTag)) {
        collecting = true;
      }
      if (collecting && hasTag(oldTag)) {
        break;
      }
      if (!collecting) {
        continue;
      }

      const link = row.find("a[href]").first();
      const href = link.attr("href");
      if (href) {
        commits.push({
          title: link.text().trim(),
          createdAt: row.find("span[title]").first().attr("title") ?? "",
          url: new URL(href, pageUrl).toString(),
        });
      }
    }

    return commits;
  }
}
