import randu from "@stdlib/random-base-randu";
import { requireInRange, requirePositive } from "./errors.ts";

/** A source of independent real-valued samples, one per call. */
export interface Sampler {
    next(): number;
}

/** Builds a sampler for a distribution with the given mean. */
export type SamplerFactory = (mean: number) => Sampler;

export function expovariate(lambda: number, random: () => number = Math.random) {
    return -Math.log(1 - random()) / lambda;
}

/** Exponential variates with density (1/mean)·e^(-x/mean) for x >= 0. */
export function exponential(mean: number, random: () => number = Math.random): Sampler {
    const lambda = 1 / requirePositive("mean", mean);
    return {next: () => expovariate(lambda, random)};
}

/** Largest seed the underlying mt19937 generator accepts; the smallest is 1. */
export const MAX_SEED = 4294967295;

/** Uniform [0, 1) source that repeats the same sequence for the same seed. */
export function seededRandom(seed: number): () => number {
    const prng = randu.factory({seed: requireInRange("seed", seed, 1, MAX_SEED)});
    return () => prng();
}

/**
 * Sampler factory whose samplers all draw from one generator seeded with `seed`.
 * The generator is created once, so successive samplers continue its sequence.
 */
export function seededExponential(seed: number): SamplerFactory {
    const random = seededRandom(seed);
    return mean => exponential(mean, random);
}
