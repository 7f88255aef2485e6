/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

/**
 * Source of uniformly distributed integers, injected wherever a board needs randomness.
 */
export interface RandomSource {
    /**
     * @param bound a positive integer
     * @returns an integer >= 0 and < bound
     */
    nextInt(bound: number): number;
}

/**
 * Random source backed by Math.random; not reproducible.
 */
export const mathRandom: RandomSource = {
    nextInt(bound: number): number {
        return Math.floor(Math.random() * bound);
    },
};

/**
 * Make a deterministic random source: two sources made from the same seed produce the
 * same sequence.
 *
 * Uses the mulberry32 generator over a 32-bit state.
 *
 * @param seed any number; only its low 32 bits are used
 * @returns a fresh random source
 */
export function seededRandom(seed: number): RandomSource {
    let state = seed >>> 0;
    return {
        nextInt(bound: number): number {
            state = (state + 0x6d2b79f5) >>> 0;
            let t = state;
            t = Math.imul(t ^ (t >>> 15), t | 1);
            t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
            const unit = ((t ^ (t >>> 14)) >>> 0) / 4294967296;
            return Math.floor(unit * bound);
        },
    };
}
