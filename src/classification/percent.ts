// Both helpers round through toFixed so the stored score and the displayed
// string never disagree.

export function toPercentString(probability: number): string {
  return `${(probability * 100).toFixed(2)}%`;
}

export function toPercentScore(probability: number): number {
  return Number((probability * 100).toFixed(2));
}
