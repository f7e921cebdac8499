// ===== Flat tables (aggregator / CSV shape) =====

export type CellValue = string | number | boolean | null;

export type FlatRow = Record<string, CellValue>;

export interface FlatTable {
  columns: string[];
  rows: FlatRow[];
}

// ===== Raw scrape record (collector output, messy) =====

export interface RawProviderRecord {
  [field: string]: unknown;
  source_page?: string;
  scraped_at?: string;
}

export interface RawBatchFile {
  metadata?: Record<string, unknown>;
  providers: RawProviderRecord[];
}

// ===== Canonical provider (normalized, deduplicated) =====

export type QualityFlags = Record<string, boolean>;

export interface CanonicalProvider {
  providerId: string;
  name: string;
  country: string | null;
  location: string | null;
  tier: string | null;
  industry: string | null;
  services: string[];
  references: string[];
  website: string | null;
  description: string | null;
  price: number | null;
  rating: number | null;
  reviewCount: number | null;
  sourceUrl: string | null;
  sourceBatch: string | null;
  collectedAt: string | null;
  qualityFlags: QualityFlags;
}

export interface QualityScores {
  completenessScore: number;
  validityScore: number;
  qualityScore: number;
}

export type ScoredProvider = CanonicalProvider & QualityScores;

// ===== Reference (client/project attached to one provider) =====

export enum ReferenceQuality {
  HIGH = "high",
  MEDIUM = "medium",
  LOW = "low",
}

export interface CanonicalReference {
  referenceId: string;
  providerId: string;
  clientName: string;
  country: string | null;
  industry: string | null;
  projectSizeUsers: number | null;
  isLargeProject: boolean;
  servicesImplemented: string[];
  implementationTimelineMonths: number | null;
  outcomes: string | null;
  caseStudyUrl: string | null;
  sourceUrl: string | null;
  qualityFlag: ReferenceQuality;
}

// ===== Canonical schema =====

/** Canonical provider fields in CSV column order. */
export const PROVIDER_COLUMNS = [
  "provider_id",
  "name",
  "country",
  "location",
  "tier",
  "industry",
  "services",
  "references",
  "website",
  "description",
  "price",
  "rating",
  "review_count",
  "source_url",
  "source_batch",
  "collected_at",
  "quality_flags",
] as const;

export const SCORE_COLUMNS = ["completeness_score", "validity_score", "quality_score"] as const;

export const REFERENCE_COLUMNS = [
  "reference_id",
  "provider_id",
  "client_name",
  "country",
  "industry",
  "project_size_users",
  "is_large_project",
  "services_implemented",
  "implementation_timeline_months",
  "outcomes",
  "case_study_url",
  "source_url",
  "quality_flag",
] as const;

// ===== Stage results =====

export interface SkippedFile {
  file: string;
  reason: string;
}

export interface AggregateResult {
  table: FlatTable;
  files: string[];
  skipped: SkippedFile[];
  outputPath: string | null;
}

export interface CleanStats {
  inputRows: number;
  droppedNoName: number;
  duplicatesMerged: number;
  unmappedValues: number;
  outputRows: number;
}

export interface CleanResult {
  providers: CanonicalProvider[];
  references: CanonicalReference[];
  stats: CleanStats;
}

export interface QualityReport {
  totalProviders: number;
  averageCompleteness: number;
  averageValidity: number;
  averageQuality: number;
  completenessDistribution: Record<"high" | "medium" | "low", number>;
  qualityDistribution: Record<"high" | "medium" | "low", number>;
  commonQualityIssues: Record<string, number>;
  generatedAt: string;
}
