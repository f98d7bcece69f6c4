/**
 * Market record helpers: candidate naming and candlestick prices.
 */

import type { Observation } from '../types/table.js';

// ─── Types ───────────────────────────────────────────────────────────

/** The naming fields a market record may carry. All optional. */
export interface MarketRecord {
  ticker?: string;
  yesSubTitle?: string;
  subtitle?: string;
  title?: string;
}

/** A candlestick; prices are in cents. */
export interface Candlestick {
  endPeriodTs?: number;
  ts?: number;
  price?: { close?: number | null; mean?: number | null } | null;
  close?: number | null;
  yesPrice?: number | null;
}

export interface MarketHistory {
  market: MarketRecord;
  candlesticks: Candlestick[];
}

// ─── Naming ──────────────────────────────────────────────────────────

const TITLE_PREFIXES = ['Will ', 'will '] as const;
const TITLE_CUTS = ['?', ' win', ' be '] as const;

function nonBlank(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/** "Will Jane Doe win the race?" → "Jane Doe" */
function nameFromTitle(title: string | undefined): string | null {
  if (!title) return null;
  for (const prefix of TITLE_PREFIXES) {
    const at = title.lastIndexOf(prefix);
    if (at === -1) continue;
    let name = title.slice(at + prefix.length);
    for (const cut of TITLE_CUTS) {
      name = name.split(cut)[0];
    }
    return name.trim();
  }
  return null;
}

/** "KXMICHCOACH-25-JDOE" → "JDOE" */
function nameFromTicker(ticker: string | undefined): string | null {
  if (!ticker) return null;
  if (ticker.includes('-')) {
    return ticker.slice(ticker.lastIndexOf('-') + 1).toUpperCase();
  }
  return ticker;
}

/**
 * Display name for a market, taken from the first source that yields one:
 * yes-side subtitle, subtitle, the subject of a "Will X …?" title, the ticker
 * suffix, the ticker, then "Unknown".
 */
export function deriveSeriesName(market: MarketRecord): string {
  return (
    nonBlank(market.yesSubTitle) ??
    nonBlank(market.subtitle) ??
    nameFromTitle(market.title) ??
    nameFromTicker(market.ticker) ??
    'Unknown'
  );
}

// ─── Prices ──────────────────────────────────────────────────────────

/** Close price in cents; zero when the candle carries none. */
export function extractClosePrice(candle: Candlestick): number {
  if (candle.price) {
    return candle.price.close || candle.price.mean || 0;
  }
  return candle.close ?? candle.yesPrice ?? 0;
}

/** Flatten per-market candle histories into long-format observations. */
export function marketsToObservations(histories: readonly MarketHistory[]): Observation[] {
  const observations: Observation[] = [];
  for (const { market, candlesticks } of histories) {
    const series = deriveSeriesName(market);
    for (const candle of candlesticks) {
      const timestamp = candle.endPeriodTs ?? candle.ts;
      if (timestamp === undefined) continue;
      observations.push({
        timestamp,
        series,
        value: extractClosePrice(candle) / 100,
      });
    }
  }
  return observations;
}
