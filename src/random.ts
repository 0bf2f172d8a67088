/** A pseudo-random stream of floats in [0, 1). */
export type Rng = () => number;

export const mulberry32 = (seed: number): Rng => {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
};

// Used when the caller gives no seed; the drawn seed is reported with the results.
export const randomSeed = (): number => Math.floor(Math.random() * 4294967296);

export const randomHex = (rng: Rng, digits: number): string => {
  let out = '';
  for (let i = 0; i < digits; i++) {
    out += Math.floor(rng() * 16).toString(16);
  }
  return out;
};
