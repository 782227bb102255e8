// Points per simultaneous clear at level 1; larger batches score 200 per row
const BATCH_POINTS: Readonly<Record<number, number>> = {
  1: 100,
  2: 300,
  3: 500,
  4: 800,
};

/**
 * Score for N rows cleared by one lock, at the level in force before the clear.
 */
export function scoreForLines(count: number, level: number): number {
  if (count <= 0) return 0;
  const base = BATCH_POINTS[count] ?? count * 200;
  return base * level;
}

export function levelForLines(lines: number, linesPerLevel = 10): number {
  return 1 + Math.floor(lines / linesPerLevel);
}
