/**
 * Revenue analyzer: recognized revenue (Closed Won deals + Completed work
 * orders), forecast from the weighted open pipeline, sector and monthly
 * breakdowns.
 */

import { toDollars } from '@boardlens/shared';
import { OPEN_STAGES, SECTORS, UNKNOWN_BUCKET } from '../constants';
import type { AnalysisDataset, AnalyzerOutput, DealRecord, KeyMetrics, MetricValue, QueryIntent, WorkOrderRecord } from '../types';
import type { AnalysisConfig } from '../config/analysis-config';
import { mappedCategory } from '../normalizers/category';
import type { AnalysisContext } from './context';
import { categoryBucket, centsOf } from './distribution';
import { money } from './narrative';
import { weightedCentsOf } from './pipeline-analyzer';

// ── Facts ────────────────────────────────────────────────────────────

export interface SectorRevenue {
  recognizedCents: number;
  forecastCents: number;
}

export interface RevenueFacts {
  recognizedDealCents: number;
  recognizedWorkOrderCents: number;
  recognizedCents: number;
  forecastCents: number;
  sectors: Map<string, SectorRevenue>;
  /** `YYYY-MM` → recognized cents, for items with a valid close/end date. */
  byMonth: Map<string, number>;
}

function addTo<K>(map: Map<K, number>, key: K, cents: number): void {
  map.set(key, (map.get(key) ?? 0) + cents);
}

export function computeRevenueFacts(
  deals: readonly DealRecord[],
  workOrders: readonly WorkOrderRecord[],
  config: AnalysisConfig,
): RevenueFacts {
  const sectors = new Map<string, SectorRevenue>();
  const byMonth = new Map<string, number>();
  const sectorEntry = (key: string | null): SectorRevenue | null => {
    if (key === null) return null;
    const entry = sectors.get(key) ?? { recognizedCents: 0, forecastCents: 0 };
    sectors.set(key, entry);
    return entry;
  };

  let recognizedDealCents = 0;
  let forecastCents = 0;
  for (const deal of deals) {
    const stage = mappedCategory(deal.fields.stage);
    if (stage === 'Closed Won') {
      const cents = centsOf(deal.fields.amount);
      if (cents === null) continue;
      recognizedDealCents += cents;
      const sector = sectorEntry(categoryBucket(deal.fields.sector));
      if (sector) sector.recognizedCents += cents;
      const date = deal.fields.closeDate;
      if (date.valid && date.value !== null) addTo(byMonth, date.value.slice(0, 7), cents);
    } else if (stage !== null && OPEN_STAGES.includes(stage)) {
      const weighted = weightedCentsOf(deal, config);
      if (weighted === null) continue;
      forecastCents += weighted;
      const sector = sectorEntry(categoryBucket(deal.fields.sector));
      if (sector) sector.forecastCents += weighted;
    }
  }

  let recognizedWorkOrderCents = 0;
  for (const order of workOrders) {
    if (mappedCategory(order.fields.status) !== 'Completed') continue;
    const cents = centsOf(order.fields.revenue);
    if (cents === null) continue;
    recognizedWorkOrderCents += cents;
    const sector = sectorEntry(categoryBucket(order.fields.sector));
    if (sector) sector.recognizedCents += cents;
    const date = order.fields.endDate;
    if (date.valid && date.value !== null) addTo(byMonth, date.value.slice(0, 7), cents);
  }

  return {
    recognizedDealCents,
    recognizedWorkOrderCents,
    recognizedCents: recognizedDealCents + recognizedWorkOrderCents,
    forecastCents,
    sectors,
    byMonth,
  };
}

// ── Metrics ──────────────────────────────────────────────────────────

interface RankedSector extends SectorRevenue {
  sector: string;
  totalCents: number;
}

function rankSectors(sectors: ReadonlyMap<string, SectorRevenue>): RankedSector[] {
  return [...SECTORS, UNKNOWN_BUCKET]
    .flatMap((sector) => {
      const entry = sectors.get(sector);
      return entry ? [{ sector, ...entry, totalCents: entry.recognizedCents + entry.forecastCents }] : [];
    })
    .sort((a, b) => b.totalCents - a.totalCents);
}

function monthRows(byMonth: ReadonlyMap<string, number>): { [month: string]: MetricValue } {
  const out: { [month: string]: MetricValue } = {};
  for (const month of [...byMonth.keys()].sort()) {
    out[month] = toDollars(byMonth.get(month) ?? 0);
  }
  return out;
}

export function revenueMetrics(facts: RevenueFacts): KeyMetrics {
  return {
    recognized_revenue: toDollars(facts.recognizedCents),
    recognized_from_deals: toDollars(facts.recognizedDealCents),
    recognized_from_work_orders: toDollars(facts.recognizedWorkOrderCents),
    forecasted_revenue: toDollars(facts.forecastCents),
    revenue_outlook: toDollars(facts.recognizedCents + facts.forecastCents),
    sector_breakdown: rankSectors(facts.sectors).map((s) => ({
      sector: s.sector,
      recognized: toDollars(s.recognizedCents),
      forecasted: toDollars(s.forecastCents),
      total: toDollars(s.totalCents),
    })),
    revenue_by_month: monthRows(facts.byMonth),
  };
}

// ── Narrative ────────────────────────────────────────────────────────

/** Month with the most recognized revenue; earliest wins ties. */
export function peakMonth(byMonth: ReadonlyMap<string, number>): { month: string; cents: number } | null {
  let peak: { month: string; cents: number } | null = null;
  for (const month of [...byMonth.keys()].sort()) {
    const cents = byMonth.get(month) ?? 0;
    if (peak === null || cents > peak.cents) peak = { month, cents };
  }
  return peak;
}

function revenueImplications(facts: RevenueFacts): string[] {
  const out: string[] = [];

  const [top] = rankSectors(facts.sectors);
  if (top && top.totalCents > 0) {
    out.push(`${top.sector} leads with ${money(top.totalCents)} recognized and forecast revenue.`);
  }
  if (facts.forecastCents === 0) {
    out.push('No open pipeline is contributing to the forecast.');
  }
  const peak = peakMonth(facts.byMonth);
  if (peak && peak.cents > 0) {
    out.push(`Recognized revenue peaked in ${peak.month} at ${money(peak.cents)}.`);
  }

  if (out.length === 0) out.push('No revenue exceptions stand out.');
  return out;
}

export function analyzeRevenue(
  dataset: AnalysisDataset,
  _intent: Pick<QueryIntent, 'filters'>,
  context: AnalysisContext,
): AnalyzerOutput {
  const facts = computeRevenueFacts(dataset.deals, dataset.workOrders, context.config);

  return {
    executiveSummary:
      `Recognized revenue is ${money(facts.recognizedCents)} (${money(facts.recognizedDealCents)} from closed-won deals, ` +
      `${money(facts.recognizedWorkOrderCents)} from completed work orders). Forecasted revenue from the open pipeline is ` +
      `${money(facts.forecastCents)}, for an outlook of ${money(facts.recognizedCents + facts.forecastCents)}.`,
    keyMetrics: revenueMetrics(facts),
    implications: revenueImplications(facts),
  };
}
