import { describe, it, expect } from 'vitest';
import { reconstructTeamDiff } from '../src/domain/teamDiff.js';
import { enemy, own, PLAYER, snap } from './fixtures.js';

describe('reconstructTeamDiff', () => {
  it('returns the after differential when exactly one net death happened', () => {
    const before = snap(5, 5);
    const after = snap(4, 5, { dead: true });
    expect(reconstructTeamDiff(PLAYER, before, after)).toEqual({ teamDiff: -1, source: 'single_death' });
  });

  it('does not consult the kill feed on the single-death path', () => {
    // Replaying this feed would give 0 (enemy death first), so -1 proves the feed was skipped.
    const before = snap(4, 4);
    const after = snap(3, 4, { feed: [enemy('e1'), own(PLAYER)] });
    expect(reconstructTeamDiff(PLAYER, before, after)).toEqual({ teamDiff: -1, source: 'single_death' });
  });

  it('replays the feed when several deaths land in one gap', () => {
    const before = snap(5, 5);
    const after = snap(3, 5, { feed: [own('mateX', 'enemy1'), own(PLAYER, 'enemy2')] });
    expect(reconstructTeamDiff(PLAYER, before, after)).toEqual({ teamDiff: -2, source: 'feed_match' });
  });

  it('counts an opposing death that happened before the player died', () => {
    const before = snap(5, 5);
    const after = snap(4, 4, { feed: [enemy('e1'), own(PLAYER)] });
    expect(reconstructTeamDiff(PLAYER, before, after)).toEqual({ teamDiff: 0, source: 'feed_match' });
  });

  it('ignores an opposing death that happened after the player died', () => {
    const before = snap(5, 5);
    const after = snap(4, 4, { feed: [own(PLAYER), enemy('e1')] });
    expect(reconstructTeamDiff(PLAYER, before, after)).toEqual({ teamDiff: -1, source: 'feed_match' });
  });

  it('stops at the player line regardless of deaths before and after it', () => {
    const before = snap(5, 5);
    const after = snap(2, 4, { feed: [own('mate1'), enemy('e1'), own(PLAYER), own('mate2')] });
    expect(reconstructTeamDiff(PLAYER, before, after)).toEqual({ teamDiff: -1, source: 'feed_match' });
  });

  it('matches the victim name case-insensitively', () => {
    const before = snap(5, 5);
    const after = snap(3, 5, { feed: [own('mate1'), own('TARGET')] });
    expect(reconstructTeamDiff('target', before, after).source).toBe('feed_match');
  });

  it('handles the two-death scenario with the player as first victim', () => {
    const before = snap(5, 5);
    const after = snap(3, 4, {
      feed: [
        { killer: 'enemy1', victim: 'target', victimWasOwnTeam: true },
        { killer: 'teammate2', victim: 'enemy2', victimWasOwnTeam: false },
      ],
    });
    expect(reconstructTeamDiff('target', before, after).teamDiff).toBe(-1);
  });

  it('falls back to the end-of-feed differential when the player is not in the feed', () => {
    const before = snap(5, 5);
    const after = snap(3, 5, { feed: [own('mate1'), own('mate2'), enemy('e1')] });
    expect(reconstructTeamDiff(PLAYER, before, after)).toEqual({ teamDiff: -1, source: 'feed_fallback' });
  });

  it('falls back to the before differential on an empty feed', () => {
    expect(reconstructTeamDiff(PLAYER, snap(4, 4), snap(4, 4, { dead: true }))).toEqual({
      teamDiff: 0,
      source: 'feed_fallback',
    });
  });
});
