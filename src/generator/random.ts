import seedrandom from "seedrandom";

/** Uniform float in [0, 1). One instance per generation call keeps runs reproducible. */
export type RandomSource = () => number;

export function createRandomSource(seed?: string | number): RandomSource {
  if (seed === undefined) {
    return seedrandom();
  }
  return seedrandom(String(seed));
}
