/**
 * Input document loading for the CLI.
 *
 * Accepted shapes (JSON):
 *   - `[{ "timestamp": 1718000000, "series": "A", "value": 0.42 }, ...]`
 *   - `{ "observations": [...] }` with the same records
 *   - `{ "markets": [{ "market": { "ticker": ..., "yes_sub_title": ... },
 *                      "candlesticks": [{ "end_period_ts": ..., "price": { "close": 42 } }] }] }`
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { Observation, SeriesTable } from '../types/table.js';
import { InvalidTableError } from '../utils/errors.js';
import { marketsToObservations, type MarketHistory } from './market.js';
import { pivotObservations } from './table.js';

// ─── Schemas ─────────────────────────────────────────────────────────

const observationSchema = z.object({
  timestamp: z.number().finite(),
  series: z.string().min(1),
  value: z.number().finite().nullable(),
});

const centsSchema = z.number().finite().nullable().optional();

const marketHistorySchema = z.object({
  market: z.object({
    ticker: z.string().optional(),
    yes_sub_title: z.string().optional(),
    subtitle: z.string().optional(),
    title: z.string().optional(),
  }),
  candlesticks: z.array(
    z.object({
      end_period_ts: z.number().finite().optional(),
      ts: z.number().finite().optional(),
      price: z.object({ close: centsSchema, mean: centsSchema }).nullable().optional(),
      close: centsSchema,
      yes_price: centsSchema,
    })
  ),
});

const inputDocumentSchema = z.union([
  z.array(observationSchema),
  z.object({ observations: z.array(observationSchema) }),
  z.object({ markets: z.array(marketHistorySchema) }),
]);

type InputDocument = z.infer<typeof inputDocumentSchema>;
type MarketHistoryInput = z.infer<typeof marketHistorySchema>;

// ─── Conversion ──────────────────────────────────────────────────────

function toMarketHistory(input: MarketHistoryInput): MarketHistory {
  return {
    market: {
      ticker: input.market.ticker,
      yesSubTitle: input.market.yes_sub_title,
      subtitle: input.market.subtitle,
      title: input.market.title,
    },
    candlesticks: input.candlesticks.map(candle => ({
      endPeriodTs: candle.end_period_ts,
      ts: candle.ts,
      price: candle.price,
      close: candle.close,
      yesPrice: candle.yes_price,
    })),
  };
}

function toObservations(doc: InputDocument): Observation[] {
  if (Array.isArray(doc)) return doc;
  if ('observations' in doc) return doc.observations;
  return marketsToObservations(doc.markets.map(toMarketHistory));
}

/** Validate a parsed JSON document and pivot it into a series table. */
export function parseInputDocument(raw: unknown): SeriesTable {
  const parsed = inputDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .slice(0, 10)
      .map(issue => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new InvalidTableError(`Unrecognized input document:\n${details}`);
  }
  return pivotObservations(toObservations(parsed.data));
}

export async function loadInputFile(path: string): Promise<SeriesTable> {
  const text = await readFile(path, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidTableError(`${path} is not valid JSON: ${message}`);
  }
  return parseInputDocument(raw);
}
