/**
 * A snapshot or death record reached the core in a shape the HUD contract rules out
 * (negative counts, a non-integer differential, timestamps going backwards).
 * Fatal for the current classification cycle only.
 */
export class StateInvariantViolation extends Error {
  readonly kind = 'StateInvariantViolation' as const;

  constructor(
    message: string,
    readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'StateInvariantViolation';
  }
}

/** The HUD reading could not be turned into a snapshot (bad OCR text, schema mismatch). */
export class HudReadError extends Error {
  readonly kind = 'HudReadError' as const;

  constructor(
    message: string,
    readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'HudReadError';
  }
}
