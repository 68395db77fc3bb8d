/**
 * answerQuery, the single entry point. Validate the request, interpret the
 * question, validate the boards it needs, scope, analyze, assemble.
 *
 * Synchronous and free of I/O. The only side effect is logging.
 */

import { z } from 'zod';
import { format } from 'date-fns';
import { assertValidated, calendarDateSchema, generateUlid } from '@boardlens/shared';
import { logger } from '@boardlens/core';
import type { BoardKind, BoardResponse, DataQualityReport } from './types';
import { analysisConfigOverridesSchema, getAnalysisConfig, resolveAnalysisConfig } from './config/analysis-config';
import { boardItemsToRawInput } from './boards/board-items';
import { DEALS_BOARD } from './boards/deals';
import { WORK_ORDERS_BOARD } from './boards/work-orders';
import { interpretQuery } from './query/interpreter';
import { mergeQualityReports, validateBoard } from './validation';
import { ANALYZERS, boardsUsedBy, requiredFieldsFor, scopeDataset } from './analysis';
import { assembleAnalysis, assembleNoData, assembleUnintelligible } from './response';

export const answerQueryInputSchema = z.object({
  query: z.string().trim().min(1, 'Query is required').max(2000),
  deals: z.array(z.unknown()).default([]),
  workOrders: z.array(z.unknown()).default([]),
  /** `records`: RawRecord shape; `board_items`: the board service's item payload. */
  itemFormat: z.enum(['records', 'board_items']).default('records'),
  asOf: calendarDateSchema.optional(),
  config: analysisConfigOverridesSchema.optional(),
});

export type AnswerQueryInput = z.input<typeof answerQueryInputSchema>;

export function answerQuery(input: AnswerQueryInput): BoardResponse {
  const started = Date.now();
  const parsed = answerQueryInputSchema.safeParse(input);
  assertValidated(parsed, 'Invalid query request');

  const { query, itemFormat } = parsed.data;
  const toRaw = (items: unknown[]) => (itemFormat === 'board_items' ? boardItemsToRawInput(items) : items);
  const asOf = parsed.data.asOf ?? format(new Date(), 'yyyy-MM-dd');
  const config = parsed.data.config
    ? resolveAnalysisConfig(parsed.data.config, getAnalysisConfig())
    : getAnalysisConfig();
  const runId = generateUlid();

  // ── Interpret ──
  const intent = interpretQuery(query);
  const category = intent.category;
  logger.debug('Query classified', {
    runId,
    category,
    confidence: intent.confidence,
    matchedTerms: intent.matchedTerms,
  });

  // ── Validate the boards, requiring what the analysis needs ──
  const required = requiredFieldsFor(intent);
  const deals = validateBoard(DEALS_BOARD, toRaw(parsed.data.deals), required.deals);
  const workOrders = validateBoard(WORK_ORDERS_BOARD, toRaw(parsed.data.workOrders), required.workOrders);

  const used = boardsUsedBy(category);
  const reports: Record<BoardKind, DataQualityReport> = { deals: deals.report, work_orders: workOrders.report };
  const quality = mergeQualityReports(
    used.length > 0 ? used.map((board) => reports[board]) : [deals.report, workOrders.report],
  );
  const base = { runId, intent, quality, config };

  // ── Scope, analyze, assemble ──
  let response: BoardResponse;
  if (category === 'unknown') {
    response = assembleUnintelligible(base, { deals: deals.records, workOrders: workOrders.records }, asOf);
  } else {
    const scoped = scopeDataset({ deals: deals.records, workOrders: workOrders.records }, intent, asOf);
    const scopedRecords =
      (used.includes('deals') ? scoped.deals.length : 0) +
      (used.includes('work_orders') ? scoped.workOrders.length : 0);

    if (scopedRecords === 0) {
      response = assembleNoData(base);
    } else {
      const output = ANALYZERS[category](scoped, intent, {
        config,
        asOf,
        dataConfidence: quality.confidenceScore,
      });
      response = assembleAnalysis(base, output);
    }
  }

  if (response.status === 'ok' && quality.confidenceScore < config.quality.lowConfidenceThreshold) {
    logger.warn('Low data confidence', {
      runId,
      category,
      confidenceScore: quality.confidenceScore,
      validRecords: quality.validRecords,
      totalRecords: quality.totalRecords,
    });
  }
  logger.info('Query answered', {
    runId,
    category,
    status: response.status,
    confidence: intent.confidence,
    dealCount: deals.records.length,
    workOrderCount: workOrders.records.length,
    confidenceScore: quality.confidenceScore,
    durationMs: Date.now() - started,
  });

  return response;
}
