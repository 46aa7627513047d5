import seedrandom from "seedrandom";

export type Rng = () => number;

/** Seeded uniform generator on [0, 1). */
export function createRng(seed: number): Rng {
  return seedrandom(String(seed));
}

/** Standard normal sample (Box–Muller). */
export function gaussian(rng: Rng): number {
  let u = 0;
  while (u === 0) u = rng();
  const v = rng();
  return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}

/** Integer in [lo, hi]. */
export function randomInt(rng: Rng, lo: number, hi: number): number {
  return lo + Math.floor(rng() * (hi - lo + 1));
}

/** Child seed for a derived operation. */
export function deriveSeed(rng: Rng): number {
  return Math.floor(rng() * 2 ** 31);
}
