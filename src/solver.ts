/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import type { Board, BoardStatus } from './board.js';
import { neighbors } from './cell.js';
import type { Coordinate } from './cell.js';
import type { RandomSource } from './random.js';

/** Cells whose content follows from what is open and flagged. */
export interface Deduction {
    readonly safe: ReadonlyArray<Coordinate>;
    readonly mines: ReadonlyArray<Coordinate>;
}

export interface SolveReport {
    readonly status: BoardStatus;
    // random cells opened because no deduction applied
    readonly guesses: number;
    // flags placed and cells opened on account of a deduction
    readonly moves: number;
}

/**
 * Single-point deduction over the visible board.
 *
 * For each open cell with n adjacent mines, f flagged neighbours and a set U of closed
 * neighbours: if f = n every cell of U is safe; if f + |U| = n every cell of U is a mine.
 * Only what a player can see is consulted, so the result is sound as long as the existing
 * flags are.
 *
 * @param board board to inspect; not mutated
 * @returns the safe cells and the mines found, each without repeats, in the order first
 *          found scanning the open cells row by row
 */
export function deduce(board: Board): Deduction {
    const safe = new Map<string, Coordinate>();
    const mines = new Map<string, Coordinate>();
    for (let row = 0; row < board.height; ++row) {
        for (let column = 0; column < board.width; ++column) {
            const view = board.cell([row, column]);
            if (view.visibility !== 'open' || view.content.kind !== 'empty') {
                continue;
            }
            let flags = 0;
            const closed: Array<Coordinate> = [];
            for (const neighbor of neighbors([row, column], board.height, board.width)) {
                const visibility = board.cell(neighbor).visibility;
                if (visibility === 'flagged') ++flags;
                else if (visibility === 'closed') closed.push(neighbor);
            }
            if (closed.length === 0) {
                continue;
            }
            const n = view.content.adjacentMines;
            const target = flags === n ? safe : flags + closed.length === n ? mines : undefined;
            for (const coordinate of closed) {
                target?.set(`${coordinate[0]},${coordinate[1]}`, coordinate);
            }
        }
    }
    return { safe: [...safe.values()], mines: [...mines.values()] };
}

/**
 * Play a board until it is finished or no deduction applies.
 *
 * Each round flags every deduced mine, then opens every deduced safe cell. When nothing
 * can be deduced and a random source is given, one closed cell is opened at random.
 *
 * @param board board to play; mutated
 * @param random source for guesses; without one the solver stops when stuck
 * @returns final status and how many moves and guesses were made
 */
export function solve(board: Board, random?: RandomSource): SolveReport {
    let guesses = 0;
    let moves = 0;
    while (board.status() === 'in-progress') {
        const { safe, mines } = deduce(board);
        if (safe.length + mines.length > 0) {
            for (const mine of mines) {
                if (board.flag(mine).outcome === 'flagged') ++moves;
            }
            for (const cell of safe) {
                if (board.open(cell).outcome === 'opened') ++moves;
            }
            continue;
        }
        const closed = closedCells(board);
        if (random === undefined || closed.length === 0) {
            break;
        }
        const guess = closed[random.nextInt(closed.length)];
        if (guess === undefined) {
            throw new Error('random source out of range');
        }
        board.open(guess);
        ++guesses;
    }
    return { status: board.status(), guesses, moves };
}

function closedCells(board: Board): Array<Coordinate> {
    const closed: Array<Coordinate> = [];
    for (let row = 0; row < board.height; ++row) {
        for (let column = 0; column < board.width; ++column) {
            if (board.cell([row, column]).visibility === 'closed') closed.push([row, column]);
        }
    }
    return closed;
}
