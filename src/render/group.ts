import type { NormalizedPublication } from '../mtmt/types.js';

export interface YearGroup {
  year: number;
  publications: NormalizedPublication[];
}

/** Newest year first; publications keep their fetch order inside a year. */
export function groupByYear(publications: readonly NormalizedPublication[]): YearGroup[] {
  const byYear = new Map<number, NormalizedPublication[]>();
  for (const pub of publications) {
    const bucket = byYear.get(pub.year);
    if (bucket) {
      bucket.push(pub);
    } else {
      byYear.set(pub.year, [pub]);
    }
  }

  return [...byYear.keys()]
    .sort((a, b) => b - a)
    .map((year) => ({ year, publications: byYear.get(year) ?? [] }));
}
