/**
 * Arithmetic mean, or undefined for an empty sequence
 */
export function mean(values: Iterable<number>): number | undefined {
  let count = 0;
  let sum = 0;
  for (const value of values) {
    count++;
    sum += value;
  }
  return count > 0 ? sum / count : undefined;
}

/**
 * Mean squared difference between a candidate allocation and the ideal one.
 *
 * Entries are paired by index; extra entries in the longer sequence are ignored.
 * Returns undefined when nothing can be compared, which is distinct from a
 * zero error.
 */
export function allocationError(
  candidateFractions: readonly number[],
  idealFractions: readonly number[],
): number | undefined {
  const length = Math.min(candidateFractions.length, idealFractions.length);
  const squaredDifferences: number[] = [];
  for (let i = 0; i < length; i++) {
    const diff = candidateFractions[i] - idealFractions[i];
    squaredDifferences.push(diff * diff);
  }
  return mean(squaredDifferences);
}
