/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

/**
 * Kinds of caller error a board can report.
 *
 * The first three only arise while constructing a board, `OutOfBoundsCoordinate` from any
 * operation given a coordinate outside the grid, and `MalformedLayout` from parsing a
 * layout file.
 */
export type BoardErrorKind =
    | 'InvalidDimensions'
    | 'InvalidMineCount'
    | 'DuplicateOrOutOfBoundsMine'
    | 'OutOfBoundsCoordinate'
    | 'MalformedLayout';

/**
 * Error thrown when a caller violates a board operation's requirements.
 */
export class BoardError extends Error {

    public constructor(
        public readonly kind: BoardErrorKind,
        detail: string
    ) {
        super(`${kind}: ${detail}`);
        this.name = 'BoardError';
    }
}
