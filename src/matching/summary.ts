import type { MatchResult, MatchSummary } from './types';

/**
 * Derives the run summary from the ordered result list.
 * Match percentage is rounded to one decimal place; 0 for an empty batch.
 */
export function buildMatchSummary(results: readonly MatchResult[], processingTimeMs: number): MatchSummary {
  let exactMatches = 0;
  let relaxedMatches = 0;
  let numericMatches = 0;

  for (const result of results) {
    if (result.pass === 'exact') exactMatches++;
    else if (result.pass === 'relaxed') relaxedMatches++;
    else if (result.pass === 'numeric') numericMatches++;
  }

  const totalLines = results.length;
  const matchedCount = exactMatches + relaxedMatches + numericMatches;
  const unmatchedCount = totalLines - matchedCount;
  const matchPercentage =
    totalLines > 0 ? Math.round((matchedCount / totalLines) * 1000) / 10 : 0;

  return {
    totalLines,
    matchedCount,
    unmatchedCount,
    matchPercentage,
    allMatched: totalLines > 0 && unmatchedCount === 0,
    exactMatches,
    relaxedMatches,
    numericMatches,
    processingTimeMs,
  };
}

export default buildMatchSummary;
