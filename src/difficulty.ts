/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

/** Board size and number of mines. */
export interface Difficulty {
    readonly height: number;
    readonly width: number;
    readonly mines: number;
}

export const EASY: Difficulty = { height: 9, width: 9, mines: 10 };
export const MEDIUM: Difficulty = { height: 16, width: 16, mines: 40 };
export const HARD: Difficulty = { height: 16, width: 30, mines: 99 };

const PRESETS: ReadonlyMap<string, Difficulty> = new Map([
    ['easy', EASY],
    ['medium', MEDIUM],
    ['hard', HARD],
]);

/**
 * @param height number of rows
 * @param width number of columns
 * @param density fraction of cells that hold a mine, in [0,1)
 * @returns a difficulty with floor(height * width * density) mines
 */
export function difficultyFromDensity(height: number, width: number, density: number): Difficulty {
    return { height, width, mines: Math.floor(height * width * density) };
}

/**
 * Look up a preset by name, ignoring case and surrounding whitespace.
 *
 * @throws Error if name is not one of easy, medium, hard
 */
export function parseDifficulty(name: string): Difficulty {
    const preset = PRESETS.get(name.trim().toLowerCase());
    if (preset === undefined) {
        throw new Error(`unknown difficulty: ${name}`);
    }
    return preset;
}
