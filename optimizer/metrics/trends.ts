/**
 * Trend checks over a window of composite scores. Both compare the mean of
 * the newest three scores with the mean of the rest of the window (or the
 * first score when the window holds exactly three).
 */

const RECENT_COUNT = 3;

function mean(values: number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function splitWindow(scores: number[]): { recent: number; earlier: number } | null {
  if (scores.length < RECENT_COUNT) return null;

  const recent = mean(scores.slice(-RECENT_COUNT));
  const earlier = scores.length > RECENT_COUNT
    ? mean(scores.slice(0, -RECENT_COUNT))
    : scores[0];

  return { recent, earlier };
}

/**
 * True when the recent mean fell below `ratio` times the earlier mean
 */
export function isDecliningTrend(scores: number[], ratio = 0.95): boolean {
  const split = splitWindow(scores);
  return split !== null && split.recent < split.earlier * ratio;
}

/**
 * True when the recent mean rose above `ratio` times the earlier mean
 */
export function isImprovingTrend(scores: number[], ratio = 1.02): boolean {
  const split = splitWindow(scores);
  return split !== null && split.recent > split.earlier * ratio;
}
