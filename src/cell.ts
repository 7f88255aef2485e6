/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

/**
 * A position on a board: row first, then column, both 0-indexed.
 */
export type Coordinate = readonly [row: number, column: number];

/** What a cell holds. Fixed once the board is constructed. */
export type CellContent =
    | { readonly kind: 'mine' }
    | { readonly kind: 'empty'; readonly adjacentMines: number };

/** How a cell is currently shown to the player. */
export type Visibility = 'closed' | 'flagged' | 'open';

/**
 * What a player may observe about one cell: content is only present once the cell is open.
 */
export type CellView =
    | { readonly visibility: 'closed' }
    | { readonly visibility: 'flagged' }
    | { readonly visibility: 'open'; readonly content: CellContent };

/**
 * Read-only surface of a board needed to project it to text.
 */
export interface CellGrid {
    readonly height: number;
    readonly width: number;
    cell(coordinate: Coordinate): CellView;
}

// row-major relative offsets; every enumeration of neighbours uses this order
const OFFSETS: ReadonlyArray<Coordinate> = [
    [-1, -1], [-1, 0], [-1, 1],
    [0, -1], [0, 1],
    [1, -1], [1, 0], [1, 1],
];

/**
 * Enumerate the neighbours of a cell that lie inside the grid.
 *
 * @param coordinate a cell inside a height x width grid
 * @param height number of rows
 * @param width number of columns
 * @returns the up-to-8 adjacent coordinates, in row-major order
 */
export function neighbors(coordinate: Coordinate, height: number, width: number): Array<Coordinate> {
    const [row, column] = coordinate;
    const result: Array<Coordinate> = [];
    for (const [dr, dc] of OFFSETS) {
        const r = row + dr;
        const c = column + dc;
        if (r >= 0 && r < height && c >= 0 && c < width) {
            result.push([r, c]);
        }
    }
    return result;
}

/**
 * @returns true iff coordinate holds two integers inside a height x width grid
 */
export function inBounds(coordinate: Coordinate, height: number, width: number): boolean {
    const [row, column] = coordinate;
    return Number.isInteger(row) && Number.isInteger(column)
        && row >= 0 && row < height && column >= 0 && column < width;
}
