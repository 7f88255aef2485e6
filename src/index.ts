/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

export { Board } from './board.js';
export type { BoardCounts, BoardStatus, MoveResult, Outcome, RandomBoardOptions } from './board.js';
export { inBounds, neighbors } from './cell.js';
export type { CellContent, CellGrid, CellView, Coordinate, Visibility } from './cell.js';
export { EASY, MEDIUM, HARD, difficultyFromDensity, parseDifficulty } from './difficulty.js';
export type { Difficulty } from './difficulty.js';
export { BoardError } from './errors.js';
export type { BoardErrorKind } from './errors.js';
export { render } from './format.js';
export type { FormatMode } from './format.js';
export { mathRandom, seededRandom } from './random.js';
export type { RandomSource } from './random.js';
export { deduce, solve } from './solver.js';
export type { Deduction, SolveReport } from './solver.js';
