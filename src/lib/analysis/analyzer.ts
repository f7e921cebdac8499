import type { ScoredProvider } from "../types";
import type { AnalysisConfig } from "../data-dictionary";
import { kmeans } from "./kmeans";

export const UNCATEGORIZED = "Uncategorized";
export const OTHER_SERVICE = "Other";

export interface ClusterSummary {
  clusterId: number;
  label: string;
  keywords: string[];
  count: number;
  share: number;
  meanQuality: number;
  meanCompleteness: number;
  averagePrice: number | null;
  minPrice: number | null;
  maxPrice: number | null;
}

export interface ServiceMatchSummary {
  service: string;
  count: number;
  averagePrice: number | null;
  maxPrice: number | null;
}

export interface ServiceGap {
  keyword: string;
  providerCount: number;
  coverage: number;
  isGap: boolean;
}

export interface AnalyzedProvider {
  provider: ScoredProvider;
  cluster: string;
  serviceMatch: string[];
}

export interface SummaryMetrics {
  totalProviders: number;
  countries: number;
  averageCompleteness: number;
  averageValidity: number;
  averageQuality: number;
  highQualityShare: number;
  averagePrice: number | null;
  medianPrice: number | null;
  maxPrice: number | null;
  totalReferences: number;
  clusterCount: number;
  gapCount: number;
}

export interface MarketAnalysis {
  summary: SummaryMetrics;
  clusters: ClusterSummary[];
  serviceMatches: ServiceMatchSummary[];
  gaps: ServiceGap[];
  providers: AnalyzedProvider[];
}

function round(value: number, places = 4): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

function mean(values: number[]): number {
  return values.length > 0 ? values.reduce((a, b) => a + b, 0) / values.length : 0;
}

export function median(values: number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

interface PriceStats {
  average: number | null;
  min: number | null;
  max: number | null;
}

function priceStats(providers: ScoredProvider[]): PriceStats {
  const prices = providers.map((p) => p.price).filter((p): p is number => p !== null);
  if (prices.length === 0) return { average: null, min: null, max: null };
  return { average: round(mean(prices), 2), min: Math.min(...prices), max: Math.max(...prices) };
}

/** Lower-cased services, description and name. */
export function featureText(p: ScoredProvider): string {
  return [p.services.join(" "), p.description ?? "", p.name].join(" ").toLowerCase();
}

export function featureVector(p: ScoredProvider, keywords: string[]): number[] {
  const text = featureText(p);
  return keywords.map((k) => (text.includes(k.toLowerCase()) ? 1 : 0));
}

function titleCase(text: string): string {
  return text.replace(/\b\w/g, (c) => c.toUpperCase());
}

/** Top three centroid keywords, keyword order breaking ties. */
export function clusterLabel(centroid: number[], keywords: string[]): { label: string; keywords: string[] } {
  const top = keywords
    .map((keyword, i) => ({ keyword, weight: centroid[i] ?? 0, i }))
    .filter((k) => k.weight > 0)
    .sort((a, b) => b.weight - a.weight || a.i - b.i)
    .slice(0, 3)
    .map((k) => k.keyword);
  if (top.length === 0) return { label: UNCATEGORIZED, keywords: [] };
  return { label: top.map(titleCase).join(", "), keywords: top };
}

export function matchServices(p: ScoredProvider, categories: Record<string, string[]>): string[] {
  const text = featureText(p);
  const matched = Object.entries(categories)
    .filter(([, keywords]) => keywords.some((k) => text.includes(k.toLowerCase())))
    .map(([service]) => service);
  return matched.length > 0 ? matched : [OTHER_SERVICE];
}

export function findServiceGaps(providers: ScoredProvider[], targetKeywords: string[], threshold: number): ServiceGap[] {
  const total = providers.length;
  return targetKeywords
    .map((keyword) => {
      const lower = keyword.toLowerCase();
      const providerCount = providers.filter((p) => p.services.some((s) => s.toLowerCase().includes(lower))).length;
      const coverage = total > 0 ? round(providerCount / total) : 0;
      return { keyword, providerCount, coverage, isGap: coverage < threshold };
    })
    .sort((a, b) => a.coverage - b.coverage || a.keyword.localeCompare(b.keyword));
}

function summarizeClusters(
  providers: ScoredProvider[],
  assignments: number[],
  centroids: number[][],
  keywords: string[]
): { clusters: ClusterSummary[]; labels: string[] } {
  const labelCounts = new Map<string, number>();
  const labels: string[] = [];
  const clusters: ClusterSummary[] = [];

  centroids.forEach((centroid, clusterId) => {
    const base = clusterLabel(centroid, keywords);
    const seen = (labelCounts.get(base.label) ?? 0) + 1;
    labelCounts.set(base.label, seen);
    const label = seen > 1 ? `${base.label} #${seen}` : base.label;
    labels.push(label);

    const members = providers.filter((_, i) => assignments[i] === clusterId);
    if (members.length === 0) return;
    const prices = priceStats(members);
    clusters.push({
      clusterId,
      label,
      keywords: base.keywords,
      count: members.length,
      share: round(members.length / providers.length),
      meanQuality: round(mean(members.map((m) => m.qualityScore))),
      meanCompleteness: round(mean(members.map((m) => m.completenessScore))),
      averagePrice: prices.average,
      minPrice: prices.min,
      maxPrice: prices.max,
    });
  });

  clusters.sort((a, b) => b.count - a.count || b.meanQuality - a.meanQuality || a.label.localeCompare(b.label));
  return { clusters, labels };
}

function summarizeServiceMatches(analyzed: AnalyzedProvider[], categories: string[]): ServiceMatchSummary[] {
  return [...categories, OTHER_SERVICE]
    .map((service) => {
      const members = analyzed.filter((a) => a.serviceMatch.includes(service)).map((a) => a.provider);
      const prices = priceStats(members);
      return { service, count: members.length, averagePrice: prices.average, maxPrice: prices.max };
    })
    .filter((s) => s.count > 0)
    .sort((a, b) => b.count - a.count || a.service.localeCompare(b.service));
}

/**
 * Cluster providers by service keywords, match them to service categories
 * and find under-served target keywords. Fully deterministic.
 */
export function analyzeProviders(scored: ScoredProvider[], analysisConfig: AnalysisConfig): MarketAnalysis {
  const keywords = analysisConfig.cluster_keywords;
  const vectors = scored.map((p) => featureVector(p, keywords));
  const { assignments, centroids } = kmeans(vectors, analysisConfig.cluster_count, analysisConfig.max_iterations);
  const { clusters, labels } = summarizeClusters(scored, assignments, centroids, keywords);

  const analyzed: AnalyzedProvider[] = scored.map((provider, i) => ({
    provider,
    cluster: labels[assignments[i]] ?? UNCATEGORIZED,
    serviceMatch: matchServices(provider, analysisConfig.service_categories),
  }));

  const gaps = findServiceGaps(scored, analysisConfig.target_service_keywords, analysisConfig.gap_threshold);
  const serviceMatches = summarizeServiceMatches(analyzed, Object.keys(analysisConfig.service_categories));

  const prices = scored.map((p) => p.price).filter((p): p is number => p !== null);
  const summary: SummaryMetrics = {
    totalProviders: scored.length,
    countries: new Set(scored.map((p) => p.country).filter((c) => c !== null)).size,
    averageCompleteness: round(mean(scored.map((p) => p.completenessScore))),
    averageValidity: round(mean(scored.map((p) => p.validityScore))),
    averageQuality: round(mean(scored.map((p) => p.qualityScore))),
    highQualityShare: scored.length > 0 ? round(scored.filter((p) => p.qualityScore > 0.8).length / scored.length) : 0,
    averagePrice: prices.length > 0 ? round(mean(prices), 2) : null,
    medianPrice: median(prices),
    maxPrice: prices.length > 0 ? Math.max(...prices) : null,
    totalReferences: scored.reduce((sum, p) => sum + p.references.length, 0),
    clusterCount: clusters.length,
    gapCount: gaps.filter((g) => g.isGap).length,
  };

  console.log(
    `[analyze] ${summary.totalProviders} provider(s) in ${summary.clusterCount} cluster(s), ` +
      `${summary.gapCount} service gap(s)`
  );
  return { summary, clusters, serviceMatches, gaps, providers: analyzed };
}
