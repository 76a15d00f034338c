import { z } from 'zod';
import { HudReadError } from './errors.js';

export const RoundPhaseSchema = z.enum(['PRE_ROUND', 'MID_ROUND', 'POST_ROUND']);
export type RoundPhase = z.infer<typeof RoundPhaseSchema>;

// Banner words shown at the top of the screen outside the live part of a round.
const BANNER_PHASES: Record<string, RoundPhase> = {
  'buy phase': 'PRE_ROUND',
  lost: 'POST_ROUND',
  won: 'POST_ROUND',
  clutch: 'POST_ROUND',
  ace: 'POST_ROUND',
};

/**
 * First banner word with a known phase wins; no recognised banner means the round is live.
 */
export function classifyRoundPhase(bannerWords: readonly string[]): RoundPhase {
  for (const word of bannerWords) {
    const phase = BANNER_PHASES[word.trim().toLowerCase()];
    if (phase) return phase;
  }
  return 'MID_ROUND';
}

export type RoundInfo = {
  currentRound: number;
  roundTimeSec: number;
  /** "own - opposing" */
  score: string;
};

function parseCount(text: string, field: string): number {
  const t = text.trim();
  if (!/^\d+$/.test(t)) {
    throw new HudReadError(`Invalid ${field}: ${JSON.stringify(text)}`, { field, text });
  }
  return Number(t);
}

/**
 * Round clock text to seconds. OCR regularly reads the colon as a dot, so "1.23" is "1:23".
 */
export function parseRoundClock(text: string): number {
  const normalized = text.trim().replace('.', ':');
  const parts = normalized.split(':');
  if (parts.length !== 2) {
    throw new HudReadError(`Invalid round clock: ${JSON.stringify(text)}`, { text });
  }
  const [mins = '', secs = ''] = parts;
  return parseCount(mins, 'clock minutes') * 60 + parseCount(secs, 'clock seconds');
}

/**
 * The score bar reads as three texts: own score, round clock, opposing score.
 */
export function parseRoundInfo(texts: readonly string[]): RoundInfo {
  if (texts.length !== 3) {
    throw new HudReadError(`Expected 3 round info texts, got ${texts.length}`, { texts });
  }
  const [ownText = '', clockText = '', opposingText = ''] = texts;
  const own = parseCount(ownText, 'own score');
  const opposing = parseCount(opposingText, 'opposing score');

  return {
    currentRound: own + opposing + 1,
    roundTimeSec: parseRoundClock(clockText),
    score: `${own} - ${opposing}`,
  };
}
