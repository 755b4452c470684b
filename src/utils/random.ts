/* ------------------------------------------------- */
/* File: src/utils/random.ts                         */
/* ------------------------------------------------- */
export type RandomSource = () => number;

export function randomChoice<T>(arr: readonly T[], random: RandomSource = Math.random): T {
  if (arr.length === 0) throw new RangeError("randomChoice on an empty array");
  return arr[Math.floor(random() * arr.length)];
}

/** entier dans [0, max) */
export function randomInt(max: number, random: RandomSource = Math.random): number {
  return Math.floor(random() * max);
}
