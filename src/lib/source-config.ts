import fs from "fs";
import path from "path";
import { z } from "zod";
import { config } from "./config";
import { ConfigError, errorMessage } from "./errors";

const fieldRuleSchema = z.object({
  selector: z.string().min(1),
  attr: z.string().min(1).optional(),
  multiple: z.boolean().default(false),
});

const targetSchema = z
  .object({
    base_url: z.string().url(),
    country_code: z
      .string()
      .regex(/^[A-Za-z]{2}$/, "Expected a 2-letter country code")
      .transform((c) => c.toUpperCase())
      .optional(),
    block_markers: z.array(z.string().min(1)).default([]),
    selectors: z.object({
      listing: z.object({
        item: z.string().min(1).optional(),
        provider_link: z.string().min(1).optional(),
        next_page: z.string().min(1).optional(),
      }),
      fields: z.record(fieldRuleSchema).optional(),
      detail: z.record(fieldRuleSchema).optional(),
    }),
  })
  .superRefine((target, ctx) => {
    const { listing, fields, detail } = target.selectors;
    const cardMode = Boolean(listing.item && fields);
    const detailMode = Boolean(listing.provider_link && detail);
    if (!cardMode && !detailMode) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["selectors"],
        message: "Target needs listing.item with fields, or listing.provider_link with detail",
      });
    }
  });

export const scraperConfigSchema = z.object({
  scraping_settings: z
    .object({
      rate_limit_ms: z.number().int().min(0).default(config.scrapeDelayMs),
      timeout_ms: z.number().int().positive().default(config.fetchTimeoutMs),
      retries: z.union([z.literal(0), z.literal(1)]).default(1),
      max_pages: z.number().int().positive().default(10),
    })
    .default({}),
  output_settings: z
    .object({
      raw_data_dir: z.string().min(1).default(path.join(config.dataDir, "raw")),
      filename_pattern: z
        .string()
        .refine((p) => p.includes("{page}"), "filename_pattern must contain {page}")
        .default("{target}_page_{page}.json"),
      save_html_snapshots: z.boolean().default(false),
      html_snapshot_dir: z.string().min(1).default(path.join(config.dataDir, "snapshots")),
    })
    .default({}),
  targets: z.record(targetSchema).refine((t) => Object.keys(t).length > 0, "At least one target is required"),
});

export type ScraperConfig = z.infer<typeof scraperConfigSchema>;
export type TargetConfig = z.infer<typeof targetSchema>;
export type FieldRule = z.infer<typeof fieldRuleSchema>;

export type CollectMode = "card" | "detail";

export function parseScraperConfig(input: unknown, source = "scraper config"): ScraperConfig {
  const result = scraperConfigSchema.safeParse(input);
  if (!result.success) throw ConfigError.fromZod(source, result.error);
  return result.data;
}

export function loadScraperConfig(filePath: string = config.scraperConfigPath): ScraperConfig {
  const resolved = path.resolve(process.cwd(), filePath);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Cannot read scraper config ${resolved}: ${errorMessage(err)}`, { cause: err });
  }
  return parseScraperConfig(raw, path.basename(resolved));
}

export function getTarget(scraperConfig: ScraperConfig, name: string): TargetConfig {
  const target = scraperConfig.targets[name];
  if (!target) {
    const known = Object.keys(scraperConfig.targets).sort().join(", ");
    throw new ConfigError(`Unknown target "${name}" (known: ${known})`);
  }
  return target;
}

/** Card mode wins when a target defines both. */
export function collectMode(target: TargetConfig): CollectMode {
  return target.selectors.listing.item && target.selectors.fields ? "card" : "detail";
}
