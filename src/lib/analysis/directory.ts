import type { CanonicalProvider, CanonicalReference } from "../types";

export const UNKNOWN = "Unknown";
const TOP_N = 10;

export interface CountRow {
  label: string;
  count: number;
}

export interface TierClients {
  tier: string;
  partners: number;
  averageClients: number;
}

export interface TopPartner {
  name: string;
  country: string | null;
  tier: string | null;
  clientCount: number;
}

export interface DirectoryKpis {
  totalPartners: number;
  totalClients: number;
  detailedClients: number;
  countries: number;
  averageClientsPerPartner: number;
  largeProjects: number;
}

export interface DirectorySummary {
  kpis: DirectoryKpis;
  partnersByTier: CountRow[];
  partnersByCountry: CountRow[];
  clientIndustries: CountRow[];
  clientsPerTier: TierClients[];
  topPartners: TopPartner[];
}

function round(value: number, places = 2): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

/** Counts per label, largest first, label order breaking ties. */
export function countBy<T>(items: T[], labelOf: (item: T) => string | null): CountRow[] {
  const counts = new Map<string, number>();
  for (const item of items) {
    const label = labelOf(item) ?? UNKNOWN;
    counts.set(label, (counts.get(label) ?? 0) + 1);
  }
  return [...counts.entries()]
    .map(([label, count]) => ({ label, count }))
    .sort((a, b) => b.count - a.count || a.label.localeCompare(b.label));
}

/**
 * Partner and client breakdowns for the directory dashboard. A partner's
 * client count is the length of its reference list; industries and project
 * sizes come from the detailed references.
 */
export function summarizeDirectory(providers: CanonicalProvider[], references: CanonicalReference[]): DirectorySummary {
  const totalClients = providers.reduce((sum, p) => sum + p.references.length, 0);

  const byTier = new Map<string, CanonicalProvider[]>();
  for (const p of providers) {
    const tier = p.tier ?? UNKNOWN;
    byTier.set(tier, [...(byTier.get(tier) ?? []), p]);
  }
  const clientsPerTier = [...byTier.entries()]
    .map(([tier, members]) => ({
      tier,
      partners: members.length,
      averageClients: round(members.reduce((sum, p) => sum + p.references.length, 0) / members.length),
    }))
    .sort((a, b) => b.averageClients - a.averageClients || a.tier.localeCompare(b.tier));

  const topPartners = providers
    .filter((p) => p.references.length > 0)
    .map((p) => ({ name: p.name, country: p.country, tier: p.tier, clientCount: p.references.length }))
    .sort((a, b) => b.clientCount - a.clientCount || a.name.localeCompare(b.name))
    .slice(0, TOP_N);

  return {
    kpis: {
      totalPartners: providers.length,
      totalClients,
      detailedClients: references.length,
      countries: new Set(providers.map((p) => p.country).filter((c) => c !== null)).size,
      averageClientsPerPartner: providers.length > 0 ? round(totalClients / providers.length) : 0,
      largeProjects: references.filter((r) => r.isLargeProject).length,
    },
    partnersByTier: countBy(providers, (p) => p.tier),
    partnersByCountry: countBy(providers, (p) => p.country).slice(0, TOP_N),
    clientIndustries: countBy(references, (r) => r.industry).slice(0, TOP_N),
    clientsPerTier,
    topPartners,
  };
}
