// Scoring shared by both store backends. Scores live on a 0-100 scale
// (the in-memory heuristic may exceed 100), and a candidate is a match
// strictly above MATCH_THRESHOLD.

export const MATCH_THRESHOLD = 80.0;
export const EXACT_ID_SCORE = 100.0;
export const ID_EQUALS_SCORE = 95.0;
export const TYPE_BONUS = 10.0;

export function isMatch(score: number): boolean {
  return score > MATCH_THRESHOLD;
}

/**
 * In-memory heuristic. 95 when the query equals the raw id ignoring case,
 * otherwise the share of the name covered by the query when the name contains
 * it. Not clamped: a query longer than the matched name scores above 100.
 */
export function heuristicScore(query: string, rawKey: string, name: string): number {
  const low = query.toLowerCase();
  if (rawKey.toLowerCase() === low) {
    return ID_EQUALS_SCORE;
  }
  if (name.length > 0 && name.toLowerCase().includes(low)) {
    return (low.length * 100) / name.length;
  }
  return 0;
}

/**
 * Factor that maps a full-text engine's native rank onto the heuristic scale.
 * Computed once per query from the first accepted hit, so that hit scores what
 * the in-memory length ratio would give it; every later hit keeps its rank
 * relative to the first. bm25() ranks are negative, which the factor absorbs.
 * Returns 0 when the native score carries no information.
 */
export function scoreScale(query: string, candidateId: string, candidateName: string, nativeScore: number): number {
  if (nativeScore === 0 || !Number.isFinite(nativeScore)) return 0;
  const byId = candidateId.length > 0 ? query.length / candidateId.length : 0;
  const byName = candidateName.length > 0 ? query.length / candidateName.length : 0;
  return (Math.max(byId, byName) * 100) / nativeScore;
}

export function normalizeScore(nativeScore: number, scale: number): number {
  const score = nativeScore * scale;
  return score > 0 ? score : 0;
}

/**
 * Scale taken from the first accepted hit that carries a native score. Hits
 * before that one score 0; the scale is fixed once it is non-zero.
 */
export class FirstHitScale {
  private scale = 0;

  constructor(private readonly query: string) {}

  score(candidateId: string, candidateName: string, nativeScore: number): number {
    if (this.scale === 0) {
      this.scale = scoreScale(this.query, candidateId, candidateName, nativeScore);
    }
    return normalizeScore(nativeScore, this.scale);
  }
}
