/**
 * First `terms` values of Recamán's sequence: step back by n when the result
 * is positive and unseen, otherwise step forward by n.
 */
export function recamanSequence(terms: number): number[] {
  if (!Number.isInteger(terms) || terms < 1) {
    throw new RangeError(`terms must be a positive integer, got ${terms}`);
  }

  const sequence = [0];
  const seen = new Set<number>(sequence);
  let current = 0;

  for (let n = 1; n < terms; n++) {
    const candidate = current - n;
    current = candidate > 0 && !seen.has(candidate) ? candidate : current + n;
    seen.add(current);
    sequence.push(current);
  }

  return sequence;
}
