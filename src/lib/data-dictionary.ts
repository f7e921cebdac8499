import fs from "fs";
import path from "path";
import { z } from "zod";
import { config } from "./config";
import { ConfigError, errorMessage } from "./errors";

const countrySchema = z.object({
  name: z.string().min(1),
  full_name: z.string().min(1).optional(),
  aliases: z.array(z.string()).default([]),
});

const analysisSchema = z.object({
  cluster_keywords: z.array(z.string().min(1)).min(1),
  cluster_count: z.number().int().positive(),
  max_iterations: z.number().int().positive().default(50),
  target_service_keywords: z.array(z.string().min(1)),
  gap_threshold: z.number().min(0).max(1),
  service_categories: z.record(z.array(z.string().min(1))).default({}),
});

export const dataDictionarySchema = z.object({
  field_aliases: z.record(z.string()).default({}),
  countries: z.record(z.string().regex(/^[A-Z]{2}$/, "Country keys must be 2-letter upper-case codes"), countrySchema),
  industries: z.object({
    standardized_taxonomy: z.array(z.string().min(1)),
    normalization_map: z.record(z.string()).default({}),
    keywords: z.record(z.array(z.string())).default({}),
  }),
  tiers: z.object({
    values: z.array(z.string().min(1)),
    aliases: z.record(z.string()).default({}),
  }),
  service_modules: z
    .object({
      core_modules: z.array(z.string()).default([]),
      module_aliases: z.record(z.string()).default({}),
    })
    .default({}),
  list_delimiters: z.array(z.string().min(1)).min(1).default([";", "|", "\n"]),
  data_quality_rules: z.object({
    required_fields: z.array(z.string().min(1)).min(1),
    validation_patterns: z
      .object({ country_code: z.string().default("^[A-Z]{2}$") })
      .default({}),
    score_weights: z
      .object({
        completeness: z.number().min(0),
        validity: z.number().min(0),
      })
      .refine((w) => w.completeness + w.validity > 0, "Score weights must not both be zero")
      .default({ completeness: 0.5, validity: 0.5 }),
    large_project_users: z.number().int().positive().default(100),
  }),
  analysis: analysisSchema,
});

export type DataDictionary = z.infer<typeof dataDictionarySchema>;
export type AnalysisConfig = z.infer<typeof analysisSchema>;

/** Validate an already-parsed dictionary object. */
export function parseDataDictionary(input: unknown, source = "data dictionary"): DataDictionary {
  const result = dataDictionarySchema.safeParse(input);
  if (!result.success) throw ConfigError.fromZod(source, result.error);

  const pattern = result.data.data_quality_rules.validation_patterns.country_code;
  try {
    new RegExp(pattern);
  } catch (err) {
    throw new ConfigError(`Invalid ${source}:\n  data_quality_rules.validation_patterns.country_code: ${errorMessage(err)}`);
  }
  return result.data;
}

const cache = new Map<string, DataDictionary>();

export function loadDataDictionary(filePath: string = config.dataDictionaryPath): DataDictionary {
  const resolved = path.resolve(process.cwd(), filePath);
  const cached = cache.get(resolved);
  if (cached) return cached;

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Cannot read data dictionary ${resolved}: ${errorMessage(err)}`, { cause: err });
  }

  const dictionary = parseDataDictionary(raw, path.basename(resolved));
  cache.set(resolved, dictionary);
  return dictionary;
}
