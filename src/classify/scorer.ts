/**
 * Popularity score: normalised rating times capped review volume.
 *
 * @module classify/scorer
 */

/** Review count at which the evidence factor saturates */
export const REVIEW_SATURATION = 1000;

/**
 * Score in [0, 1], rounded to 2 decimals.
 *
 * `((rating - 1) / 4) * min(1, reviews / 1000)`; 0 when either input is
 * missing or not a finite number. A high rating with few reviews and a low
 * rating with many both pull toward 0.
 */
export function popularityScore(
  rating: number | null | undefined,
  reviewCount: number | null | undefined
): number {
  if (typeof rating !== 'number' || !Number.isFinite(rating)) return 0;
  if (typeof reviewCount !== 'number' || !Number.isFinite(reviewCount)) return 0;

  const normalizedRating = clamp01((rating - 1) / 4);
  const cappedReviews = clamp01(reviewCount / REVIEW_SATURATION);
  return Math.round(normalizedRating * cappedReviews * 100) / 100;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}
