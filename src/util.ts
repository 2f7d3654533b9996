/**
 * Seeded random selection. The seed lives in the Walk, so a run can be
 * replayed from its starting seed.
 */

// Linear congruential generator parameters (glibc)
const MODULUS = 0x80000000;
const MULTIPLIER = 1103515245;
const INCREMENT = 12345;

export type SeededIndex = Readonly<{ index: number; seed: number }>;

/**
 * Pick an index in [0, count) together with the seed for the next pick.
 * The seed scaled by `MODULUS - 1` can reach 1, which folds into the last index.
 */
export const randomIndex = (seed: number, count: number): SeededIndex => {
    const next = (MULTIPLIER * seed + INCREMENT) % MODULUS;
    const unit = next / (MODULUS - 1);
    return { index: Math.min(count - 1, Math.floor(unit * count)), seed: next };
};
