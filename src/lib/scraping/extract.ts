import * as cheerio from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import type { AnyNode } from "domhandler";
import type { FieldRule } from "../source-config";
import type { RawProviderRecord } from "../types";

const URL_ATTRS = new Set(["href", "src", "data-href"]);

export function toAbsoluteUrl(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
}

function cleanText(raw: string): string {
  return raw.replace(/\s+/g, " ").trim();
}

function readValues($: CheerioAPI, scope: Cheerio<AnyNode>, rule: FieldRule, baseUrl: string): string[] {
  const values: string[] = [];
  for (const node of scope.find(rule.selector).toArray()) {
    const $node = $(node);
    let value = rule.attr ? $node.attr(rule.attr) ?? "" : $node.text();
    value = cleanText(value);
    if (!value) continue;
    if (rule.attr && URL_ATTRS.has(rule.attr)) {
      const absolute = toAbsoluteUrl(value, baseUrl);
      if (!absolute) continue;
      value = absolute;
    }
    values.push(value);
    if (!rule.multiple) break;
  }
  return values;
}

/**
 * Apply a set of field rules inside one element. Fields with no match
 * are left out so the aggregator sees them as missing.
 */
export function extractFields(
  $: CheerioAPI,
  scope: Cheerio<AnyNode>,
  rules: Record<string, FieldRule>,
  baseUrl: string
): RawProviderRecord {
  const record: RawProviderRecord = {};
  for (const [field, rule] of Object.entries(rules)) {
    const values = readValues($, scope, rule, baseUrl);
    if (values.length === 0) continue;
    record[field] = rule.multiple ? values : values[0];
  }
  return record;
}

/** Card mode: one record per listing item. */
export function extractCards(
  html: string,
  itemSelector: string,
  rules: Record<string, FieldRule>,
  baseUrl: string
): RawProviderRecord[] {
  const $ = cheerio.load(html);
  const records: RawProviderRecord[] = [];
  $(itemSelector).each((_, el) => {
    const record = extractFields($, $(el), rules, baseUrl);
    if (Object.keys(record).length > 0) records.push(record);
  });
  return records;
}

/** Detail mode: one record from a whole provider page. */
export function extractDetail(html: string, rules: Record<string, FieldRule>, pageUrl: string): RawProviderRecord {
  const $ = cheerio.load(html);
  return extractFields($, $.root(), rules, pageUrl);
}

/** Unique absolute link targets, in document order. */
export function extractLinks(html: string, selector: string, baseUrl: string): string[] {
  const $ = cheerio.load(html);
  const seen = new Set<string>();
  $(selector).each((_, el) => {
    const href = $(el).attr("href");
    if (!href) return;
    const absolute = toAbsoluteUrl(href.trim(), baseUrl);
    if (absolute) seen.add(absolute);
  });
  return [...seen];
}

/** The next listing page, or null when there is none or it points back at the current page. */
export function extractNextPage(html: string, selector: string, currentUrl: string): string | null {
  const [next] = extractLinks(html, selector, currentUrl);
  if (!next || next === toAbsoluteUrl(currentUrl, currentUrl)) return null;
  return next;
}
