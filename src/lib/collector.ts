import fs from "fs";
import path from "path";
import type { RawBatchFile, RawProviderRecord } from "./types";
import { collectMode, getTarget, type ScraperConfig, type TargetConfig } from "./source-config";
import { delay, fetchPage } from "./scraping/utils";
import { extractCards, extractDetail, extractLinks, extractNextPage } from "./scraping/extract";
import { FetchError, errorMessage } from "./errors";
import { profiler } from "./profiler";
import { writeJsonFile } from "./table";

export interface CollectOptions {
  /** Overrides scraping_settings.max_pages */
  maxPages?: number;
  /** Overrides output_settings.raw_data_dir */
  outputDir?: string;
  now?: () => Date;
}

export interface CollectResult {
  target: string;
  pagesFetched: number;
  pagesFailed: number;
  detailPagesFailed: number;
  records: RawProviderRecord[];
  files: string[];
}

export function batchFileName(pattern: string, target: string, page: number): string {
  return pattern.replace(/\{target\}/g, target).replace(/\{page\}/g, String(page));
}

function snapshotFileName(target: string, page: number): string {
  return `${target}_page_${page}.html`;
}

/**
 * Walk the listing pages of one target and save one raw batch per page.
 * Failed pages are logged and counted; nothing here is fatal to the run.
 */
export async function collectTarget(
  name: string,
  scraperConfig: ScraperConfig,
  options: CollectOptions = {}
): Promise<CollectResult> {
  const target = getTarget(scraperConfig, name);
  const settings = scraperConfig.scraping_settings;
  const output = scraperConfig.output_settings;
  const maxPages = options.maxPages ?? settings.max_pages;
  const outputDir = options.outputDir ?? output.raw_data_dir;
  const now = options.now ?? (() => new Date());
  const mode = collectMode(target);

  const result: CollectResult = {
    target: name,
    pagesFetched: 0,
    pagesFailed: 0,
    detailPagesFailed: 0,
    records: [],
    files: [],
  };

  let fetchCount = 0;
  const politeFetch = async (url: string): Promise<string> => {
    if (fetchCount > 0 && settings.rate_limit_ms > 0) await delay(settings.rate_limit_ms);
    fetchCount++;
    return fetchPage(url, {
      retries: settings.retries,
      timeoutMs: settings.timeout_ms,
      blockMarkers: target.block_markers,
    });
  };

  const label = `collect:${name}`;
  profiler.start(label);
  console.log(`[collector] ${name}: ${mode} mode, up to ${maxPages} page(s) from ${target.base_url}`);

  let pageUrl: string | null = target.base_url;
  const visited = new Set<string>();

  for (let page = 1; pageUrl && page <= maxPages; page++) {
    visited.add(pageUrl);

    let html: string;
    try {
      html = await politeFetch(pageUrl);
    } catch (err) {
      // Without the page there is no next link to follow
      result.pagesFailed++;
      console.warn(`[collector] ${name}: listing page ${page} failed: ${describeFailure(err)}`);
      break;
    }
    result.pagesFetched++;

    const scrapedAt = now().toISOString();
    const records =
      mode === "card"
        ? extractCardRecords(html, target, pageUrl)
        : await extractDetailRecords(html, target, pageUrl, politeFetch, result);

    for (const record of records) {
      record.source_page = pageUrl;
      record.scraped_at = scrapedAt;
      if (target.country_code && record.country_code == null && record.country == null) {
        record.country_code = target.country_code;
      }
    }

    if (records.length > 0) {
      const file = path.join(outputDir, batchFileName(output.filename_pattern, name, page));
      const batch: RawBatchFile = {
        metadata: {
          target: name,
          page,
          source_page: pageUrl,
          scraped_at: scrapedAt,
          mode,
          count: records.length,
        },
        providers: records,
      };
      writeJsonFile(file, batch);
      result.files.push(file);
      result.records.push(...records);
      console.log(`[collector] ${name}: page ${page} → ${records.length} record(s) saved to ${file}`);
    } else {
      console.warn(`[collector] ${name}: page ${page} yielded no records`);
    }

    if (output.save_html_snapshots) {
      const snapshot = path.join(output.html_snapshot_dir, snapshotFileName(name, page));
      fs.mkdirSync(path.dirname(snapshot), { recursive: true });
      fs.writeFileSync(snapshot, html, "utf-8");
    }

    const nextSelector = target.selectors.listing.next_page;
    const next: string | null = nextSelector ? extractNextPage(html, nextSelector, pageUrl) : null;
    pageUrl = next && !visited.has(next) ? next : null;
  }

  profiler.stop(label, { pages: result.pagesFetched, records: result.records.length });
  console.log(
    `[collector] ${name}: ${result.pagesFetched} page(s) fetched, ${result.pagesFailed} failed, ` +
      `${result.records.length} record(s) in ${result.files.length} batch file(s)`
  );
  return result;
}

function extractCardRecords(html: string, target: TargetConfig, pageUrl: string): RawProviderRecord[] {
  const { listing, fields } = target.selectors;
  if (!listing.item || !fields) return [];
  return extractCards(html, listing.item, fields, pageUrl);
}

async function extractDetailRecords(
  html: string,
  target: TargetConfig,
  pageUrl: string,
  politeFetch: (url: string) => Promise<string>,
  result: CollectResult
): Promise<RawProviderRecord[]> {
  const { listing, detail } = target.selectors;
  if (!listing.provider_link || !detail) return [];

  const records: RawProviderRecord[] = [];
  const links = extractLinks(html, listing.provider_link, pageUrl);
  for (const link of links) {
    try {
      const detailHtml = await politeFetch(link);
      const record = extractDetail(detailHtml, detail, link);
      if (record.source_url == null) record.source_url = link;
      records.push(record);
    } catch (err) {
      result.detailPagesFailed++;
      console.warn(`[collector] detail page skipped: ${describeFailure(err)}`);
    }
  }
  return records;
}

function describeFailure(err: unknown): string {
  if (err instanceof FetchError) return `${err.message} (attempts: ${err.attempts})`;
  return errorMessage(err);
}
