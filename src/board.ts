/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import assert from 'node:assert';
import fs from 'node:fs';
import { inBounds, neighbors } from './cell.js';
import type { CellContent, CellGrid, CellView, Coordinate, Visibility } from './cell.js';
import type { Difficulty } from './difficulty.js';
import { BoardError } from './errors.js';
import { render } from './format.js';
import type { FormatMode } from './format.js';
import { mathRandom } from './random.js';
import type { RandomSource } from './random.js';

/** Classification of a whole board. */
export type BoardStatus = 'in-progress' | 'won' | 'lost';

/**
 * What a mutating operation did.
 *
 *  - opened: one or more cells became open
 *  - flagged / unflagged: the cell's flag was set / cleared
 *  - blocked-by-flag: open was asked for a flagged cell
 *  - already-open: the cell was open, so neither open nor flagging applies
 *  - already-flagged / not-flagged: flag / unflag found the cell already in that state
 *  - not-open: chord was asked for a cell that is not open
 *  - unsatisfied: chord found neither the zero rule nor the flag rule holding, or nothing
 *    left to open around the cell
 *  - game-over: the board was already won or lost
 */
export type Outcome =
    | 'opened'
    | 'flagged'
    | 'unflagged'
    | 'blocked-by-flag'
    | 'already-open'
    | 'already-flagged'
    | 'not-flagged'
    | 'not-open'
    | 'unsatisfied'
    | 'game-over';

/**
 * Report of a mutating operation. `changed` lists the coordinates whose visibility
 * changed, in the order they changed; it is empty for every outcome except opened,
 * flagged and unflagged.
 */
export interface MoveResult {
    readonly outcome: Outcome;
    readonly status: BoardStatus;
    readonly changed: ReadonlyArray<Coordinate>;
}

/** Running totals, e.g. for a mine counter display. */
export interface BoardCounts {
    // open cells, including any exploded mine
    readonly opened: number;
    readonly flagged: number;
    // mineCount minus flags minus exploded mines; negative when over-flagged
    readonly minesLeft: number;
}

export interface RandomBoardOptions {
    /** this cell and its neighbours are kept free of mines */
    readonly safe?: Coordinate;
}

const MINE: CellContent = Object.freeze<CellContent>({ kind: 'mine' });

// one character per cell in key(): [safe, mine] for each visibility
const KEY_CODES: Record<Visibility, readonly [string, string]> = {
    closed: ['.', '*'],
    flagged: ['f', 'F'],
    open: ['o', 'X'],
};

/**
 * Minesweeper board ADT.
 *
 * A mutable rectangular grid of cells. Every cell holds either a mine or an empty square
 * labelled with its number of adjacent mines, and is closed, flagged or open. Mines never
 * move once the board is constructed; clients change the board only by opening and
 * flagging cells.
 *
 * Opening an empty cell propagates: an open empty cell with no adjacent mines (the zero
 * rule), or whose adjacent mines equal its flagged neighbours (the flag rule), opens all of
 * its closed neighbours, and each cell opened that way is examined in turn. A mine opened
 * by the flag rule (a misplaced flag) loses the game and is not expanded, but the rest of
 * the propagation still runs to completion.
 *
 * Once the board is won or lost, every mutator is a no-op reporting `game-over`.
 *
 * Boards are synchronous and not safe to share between concurrent clients without
 * external serialization; `copy()` supports copy-on-read.
 */
export class Board implements CellGrid {

    public readonly height: number;
    public readonly width: number;
    public readonly mineCount: number;

    // contents[i] is the content of the cell at (floor(i / width), i % width)
    private readonly contents: ReadonlyArray<CellContent>;

    // visibility[i] is the visibility of that same cell
    private readonly visibility: Array<Visibility>;

    private openedSafe = 0;
    private exploded = 0;
    private flagged = 0;

    // Abstraction function:
    //   AF(height, width, mineCount, contents, visibility, openedSafe, exploded, flagged) =
    //     the height x width Minesweeper board whose cell (r,c) holds contents[r*width+c]
    //     and is shown as visibility[r*width+c]; the board is lost if any mine is open,
    //     won if every empty cell is open and no mine is, and in progress otherwise.
    //
    // Representation invariant:
    //   - height and width are positive integers
    //   - contents and visibility have height*width elements
    //   - exactly mineCount elements of contents are mines, and mineCount < height*width
    //   - every empty element's adjacentMines equals the number of mines among that
    //     cell's neighbours in the grid
    //   - openedSafe, exploded and flagged equal the number of open empty cells, open
    //     mines and flagged cells respectively
    //
    // Safety from rep exposure:
    //   - contents, visibility and the counters are private
    //   - visibility is never returned; cell() and key() build fresh values from it
    //   - content objects are frozen and typed readonly, so content() and cell() may
    //     share them with clients
    //   - every coordinate handed out is a fresh tuple

    /**
     * Make a board with an explicit mine layout. All cells start closed.
     *
     * @param height number of rows; must be a positive integer
     * @param width number of columns; must be a positive integer
     * @param mines coordinates of the mines, each inside the grid and none repeated
     * @param mineCount number of mines the layout must contain; must be an integer with
     *        0 <= mineCount < height*width
     * @throws BoardError InvalidDimensions, InvalidMineCount or DuplicateOrOutOfBoundsMine
     *         when a requirement above is violated
     */
    public constructor(height: number, width: number, mines: ReadonlyArray<Coordinate>, mineCount = mines.length) {
        if (!isPositiveInteger(height) || !isPositiveInteger(width)) {
            throw new BoardError('InvalidDimensions', `${height}x${width} is not a positive size`);
        }
        const cells = height * width;
        checkMineCount(mineCount, cells);
        if (mines.length !== mineCount) {
            throw new BoardError('DuplicateOrOutOfBoundsMine', `layout has ${mines.length} mines, expected ${mineCount}`);
        }

        const isMine = new Array<boolean>(cells).fill(false);
        for (const mine of mines) {
            if (!inBounds(mine, height, width)) {
                throw new BoardError('DuplicateOrOutOfBoundsMine', `mine at (${mine[0]},${mine[1]}) is outside ${height}x${width}`);
            }
            const index = mine[0] * width + mine[1];
            if (isMine[index]) {
                throw new BoardError('DuplicateOrOutOfBoundsMine', `mine at (${mine[0]},${mine[1]}) is repeated`);
            }
            isMine[index] = true;
        }

        this.height = height;
        this.width = width;
        this.mineCount = mineCount;
        this.contents = isMine.map((mine, index): CellContent => {
            if (mine) {
                return MINE;
            }
            const adjacentMines = neighbors(coordinateOf(index, width), height, width)
                .filter(([r, c]) => isMine[r * width + c])
                .length;
            return Object.freeze<CellContent>({ kind: 'empty', adjacentMines });
        });
        this.visibility = new Array<Visibility>(cells).fill('closed');
        this.checkRep();
    }

    private checkRep(): void {
        assert(isPositiveInteger(this.height));
        assert(isPositiveInteger(this.width));
        const cells = this.height * this.width;
        assert(this.contents.length === cells);
        assert(this.visibility.length === cells);

        let mines = 0;
        let openedSafe = 0;
        let exploded = 0;
        let flagged = 0;
        for (let index = 0; index < cells; ++index) {
            const content = this.contentAt(index);
            const visibility = this.visibilityAt(index);
            if (content.kind === 'mine') {
                ++mines;
                if (visibility === 'open') ++exploded;
            } else {
                const adjacent = this.neighborIndices(index)
                    .filter(n => this.contentAt(n).kind === 'mine')
                    .length;
                assert(content.adjacentMines === adjacent);
                if (visibility === 'open') ++openedSafe;
            }
            if (visibility === 'flagged') ++flagged;
        }
        assert(mines === this.mineCount && mines < cells);
        assert(openedSafe === this.openedSafe);
        assert(exploded === this.exploded);
        assert(flagged === this.flagged);
    }

    /**
     * Make a board whose mines are drawn from a random source.
     *
     * The source is asked for exactly one integer per mine, so the same seeded source
     * always yields the same layout.
     *
     * @param height number of rows; must be a positive integer
     * @param width number of columns; must be a positive integer
     * @param mineCount number of mines; must be an integer with 0 <= mineCount < height*width,
     *        and no more than the cells left outside options.safe's neighbourhood
     * @param random source of the mine positions
     * @param options optional safe start cell
     * @returns a new board with all cells closed
     * @throws BoardError InvalidDimensions, InvalidMineCount, or OutOfBoundsCoordinate if
     *         options.safe is outside the grid
     */
    public static random(
        height: number,
        width: number,
        mineCount: number,
        random: RandomSource = mathRandom,
        options: RandomBoardOptions = {},
    ): Board {
        if (!isPositiveInteger(height) || !isPositiveInteger(width)) {
            throw new BoardError('InvalidDimensions', `${height}x${width} is not a positive size`);
        }
        const cells = height * width;
        const safe = new Set<number>();
        if (options.safe !== undefined) {
            const start = options.safe;
            if (!inBounds(start, height, width)) {
                throw new BoardError('OutOfBoundsCoordinate', `safe start (${start[0]},${start[1]}) is outside ${height}x${width}`);
            }
            for (const [r, c] of [start, ...neighbors(start, height, width)]) {
                safe.add(r * width + c);
            }
        }
        const candidates: Array<number> = [];
        for (let index = 0; index < cells; ++index) {
            if (!safe.has(index)) candidates.push(index);
        }
        checkMineCount(mineCount, cells);
        if (mineCount > candidates.length) {
            throw new BoardError('InvalidMineCount', `${mineCount} mines do not fit outside the safe start`);
        }

        // partial Fisher-Yates shuffle: candidates[0..i) are the mines chosen so far
        for (let i = 0; i < mineCount; ++i) {
            const j = i + random.nextInt(candidates.length - i);
            const chosen = candidates[j];
            const displaced = candidates[i];
            assert(Number.isInteger(j) && chosen !== undefined && displaced !== undefined, 'random source out of range');
            candidates[i] = chosen;
            candidates[j] = displaced;
        }
        const mines = candidates.slice(0, mineCount).map(index => coordinateOf(index, width));
        return new Board(height, width, mines, mineCount);
    }

    /**
     * Make a random board of a given difficulty.
     *
     * @see Board.random
     */
    public static fromDifficulty(difficulty: Difficulty, random: RandomSource = mathRandom, options: RandomBoardOptions = {}): Board {
        return Board.random(difficulty.height, difficulty.width, difficulty.mines, random, options);
    }

    /**
     * Parse a board layout.
     *
     * The first non-blank line is `HxW`; it is followed by H rows of exactly W characters,
     * `*` for a mine and `.` for a safe cell. Blank lines and surrounding whitespace are
     * ignored.
     *
     * @param text layout to parse
     * @returns a new board with all cells closed
     * @throws BoardError MalformedLayout if text does not follow the format, or any
     *         constructor error for the dimensions it declares
     */
    public static parse(text: string): Board {
        const lines = text.split(/\r?\n/).map(line => line.trim()).filter(line => line.length > 0);
        const header = lines[0];
        if (header === undefined) {
            throw new BoardError('MalformedLayout', 'empty layout');
        }
        const match = header.match(/^(\d+)x(\d+)$/);
        if (!match) {
            throw new BoardError('MalformedLayout', `invalid header "${header}"`);
        }
        const height = Number(match[1]);
        const width = Number(match[2]);
        const rows = lines.slice(1);
        if (rows.length !== height) {
            throw new BoardError('MalformedLayout', `expected ${height} rows, found ${rows.length}`);
        }

        const mines: Array<Coordinate> = [];
        rows.forEach((row, r) => {
            if (row.length !== width) {
                throw new BoardError('MalformedLayout', `row ${r} has ${row.length} cells, expected ${width}`);
            }
            Array.from(row).forEach((symbol, c) => {
                if (symbol === '*') {
                    mines.push([r, c]);
                } else if (symbol !== '.') {
                    throw new BoardError('MalformedLayout', `unexpected "${symbol}" at (${r},${c})`);
                }
            });
        });
        return new Board(height, width, mines);
    }

    /**
     * Make a new board by parsing a layout file.
     *
     * @param filename path to a layout file in the format of Board.parse
     * @returns a new board with the size and mines from the file
     * @throws Error if the file cannot be read, BoardError if it is not a valid layout
     */
    public static async parseFromFile(filename: string): Promise<Board> {
        const text = (await fs.promises.readFile(filename)).toString();
        return Board.parse(text);
    }

    /**
     * @returns won if every empty cell is open and no mine is, lost if a mine is open,
     *          in-progress otherwise
     */
    public status(): BoardStatus {
        if (this.exploded > 0) {
            return 'lost';
        }
        if (this.openedSafe === this.height * this.width - this.mineCount) {
            return 'won';
        }
        return 'in-progress';
    }

    /**
     * Observe one cell as a player would: its content is revealed only if it is open.
     *
     * @throws BoardError OutOfBoundsCoordinate if coordinate is outside the grid
     */
    public cell(coordinate: Coordinate): CellView {
        const index = this.indexOf(coordinate);
        const visibility = this.visibilityAt(index);
        if (visibility === 'open') {
            return { visibility, content: this.contentAt(index) };
        }
        return { visibility };
    }

    /**
     * Read a cell's content whatever its visibility. Meant for clients that own the layout
     * anyway, e.g. tests or an end-of-game reveal.
     *
     * @throws BoardError OutOfBoundsCoordinate if coordinate is outside the grid
     */
    public content(coordinate: Coordinate): CellContent {
        return this.contentAt(this.indexOf(coordinate));
    }

    public counts(): BoardCounts {
        return {
            opened: this.openedSafe + this.exploded,
            flagged: this.flagged,
            minesLeft: this.mineCount - this.flagged - this.exploded,
        };
    }

    /**
     * Open a cell and propagate.
     *
     * Opening a mine loses the game and changes nothing else. Opening an empty cell
     * applies the zero rule and the flag rule (see class documentation) to it and to every
     * cell they open, until neither opens anything more. Flagged cells are never opened.
     *
     * @param coordinate cell to open
     * @returns outcome opened with every cell that became open, in order (the requested
     *          cell first); or, changing nothing, blocked-by-flag, already-open or game-over
     * @throws BoardError OutOfBoundsCoordinate if coordinate is outside the grid
     */
    public open(coordinate: Coordinate): MoveResult {
        const index = this.indexOf(coordinate);
        if (this.status() !== 'in-progress') {
            return this.unchanged('game-over');
        }
        switch (this.visibilityAt(index)) {
            case 'flagged':
                return this.unchanged('blocked-by-flag');
            case 'open':
                return this.unchanged('already-open');
            case 'closed':
                break;
        }

        const changed: Array<number> = [];
        const worklist: Array<number> = [];
        this.reveal(index, changed, worklist);
        this.propagate(worklist, changed);
        if (process.env['DEBUG_BOARD']) console.log(`open (${coordinate[0]},${coordinate[1]}): ${changed.length} opened, ${this.status()}`);
        this.checkRep();
        return this.result('opened', changed);
    }

    /**
     * Re-examine an open cell: if it has no adjacent mines, or as many flagged neighbours
     * as adjacent mines, open its remaining closed neighbours and propagate as open() does.
     *
     * @param coordinate cell to re-examine
     * @returns outcome opened with the cells that became open; or, changing nothing,
     *          unsatisfied, not-open or game-over
     * @throws BoardError OutOfBoundsCoordinate if coordinate is outside the grid
     */
    public chord(coordinate: Coordinate): MoveResult {
        const index = this.indexOf(coordinate);
        if (this.status() !== 'in-progress') {
            return this.unchanged('game-over');
        }
        if (this.visibilityAt(index) !== 'open') {
            return this.unchanged('not-open');
        }
        const changed: Array<number> = [];
        this.propagate([index], changed);
        this.checkRep();
        return changed.length > 0 ? this.result('opened', changed) : this.unchanged('unsatisfied');
    }

    /**
     * Flag a closed cell, or unflag a flagged one. Never opens anything.
     *
     * @returns outcome flagged or unflagged; or, changing nothing, already-open or game-over
     * @throws BoardError OutOfBoundsCoordinate if coordinate is outside the grid
     */
    public toggleFlag(coordinate: Coordinate): MoveResult {
        const index = this.indexOf(coordinate);
        return this.setFlag(index, this.visibilityAt(index) !== 'flagged');
    }

    /**
     * Flag a closed cell.
     *
     * @returns outcome flagged; or, changing nothing, already-flagged, already-open or game-over
     * @throws BoardError OutOfBoundsCoordinate if coordinate is outside the grid
     */
    public flag(coordinate: Coordinate): MoveResult {
        return this.setFlag(this.indexOf(coordinate), true);
    }

    /**
     * Remove the flag from a flagged cell.
     *
     * @returns outcome unflagged; or, changing nothing, not-flagged, already-open or game-over
     * @throws BoardError OutOfBoundsCoordinate if coordinate is outside the grid
     */
    public unflag(coordinate: Coordinate): MoveResult {
        return this.setFlag(this.indexOf(coordinate), false);
    }

    private setFlag(index: number, wanted: boolean): MoveResult {
        if (this.status() !== 'in-progress') {
            return this.unchanged('game-over');
        }
        const visibility = this.visibilityAt(index);
        if (visibility === 'open') {
            return this.unchanged('already-open');
        }
        if ((visibility === 'flagged') === wanted) {
            return this.unchanged(wanted ? 'already-flagged' : 'not-flagged');
        }
        this.visibility[index] = wanted ? 'flagged' : 'closed';
        this.flagged += wanted ? 1 : -1;
        this.checkRep();
        return this.result(wanted ? 'flagged' : 'unflagged', [index]);
    }

    // Open the closed cell at index, recording it in changed. An empty cell is queued on
    // the worklist, followed by its open empty neighbours, whose flag rule may now hold.
    private reveal(index: number, changed: Array<number>, worklist: Array<number>): void {
        this.visibility[index] = 'open';
        changed.push(index);
        if (this.contentAt(index).kind === 'mine') {
            this.exploded += 1;
            if (process.env['DEBUG_BOARD']) console.log(`mine opened at index ${index}`);
            return;
        }
        this.openedSafe += 1;
        worklist.push(index);
        for (const neighbor of this.neighborIndices(index)) {
            if (this.visibilityAt(neighbor) === 'open' && this.contentAt(neighbor).kind === 'empty') {
                worklist.push(neighbor);
            }
        }
    }

    // Run the worklist to a fixpoint. The worklist grows while it is walked; each cell
    // opens at most once, so it holds at most nine entries per opened cell.
    private propagate(worklist: Array<number>, changed: Array<number>): void {
        for (const index of worklist) {
            if (!this.expands(index)) {
                continue;
            }
            for (const neighbor of this.neighborIndices(index)) {
                if (this.visibilityAt(neighbor) === 'closed') {
                    this.reveal(neighbor, changed, worklist);
                }
            }
        }
    }

    // true iff the cell at index is open and empty and the zero rule or the flag rule holds
    private expands(index: number): boolean {
        const content = this.contentAt(index);
        if (this.visibilityAt(index) !== 'open' || content.kind !== 'empty') {
            return false;
        }
        if (content.adjacentMines === 0) {
            return true;
        }
        const flags = this.neighborIndices(index)
            .filter(n => this.visibilityAt(n) === 'flagged')
            .length;
        return flags === content.adjacentMines;
    }

    /**
     * @returns an independent board equal to this one
     */
    public copy(): Board {
        const mines: Array<Coordinate> = [];
        this.contents.forEach((content, index) => {
            if (content.kind === 'mine') mines.push(coordinateOf(index, this.width));
        });
        const copy = new Board(this.height, this.width, mines, this.mineCount);
        this.visibility.forEach((visibility, index) => { copy.visibility[index] = visibility; });
        copy.openedSafe = this.openedSafe;
        copy.exploded = this.exploded;
        copy.flagged = this.flagged;
        copy.checkRep();
        return copy;
    }

    /**
     * @returns true iff that has the same dimensions, the same mines and the same
     *          visibility in every cell
     */
    public equals(that: Board): boolean {
        return this.height === that.height && this.width === that.width && this.key() === that.key();
    }

    /**
     * Canonical text of the whole state, for use as a Map or Set key: boards are equal iff
     * their keys are.
     *
     * @returns `HxW:` followed by one character per cell in row-major order: `.` `*`
     *          closed, `f` `F` flagged, `o` `X` open (safe, mine respectively)
     */
    public key(): string {
        const codes = this.contents.map((content, index) =>
            KEY_CODES[this.visibilityAt(index)][content.kind === 'mine' ? 1 : 0]);
        return `${this.height}x${this.width}:${codes.join('')}`;
    }

    /**
     * @returns 32-bit FNV-1a hash of key(); equal boards have equal hash codes
     */
    public hashCode(): number {
        let hash = 0x811c9dc5;
        for (const unit of this.key()) {
            hash ^= unit.charCodeAt(0);
            hash = Math.imul(hash, 0x01000193) >>> 0;
        }
        return hash;
    }

    /**
     * @param mode glyph set and layout, see FormatMode
     * @returns text rendering of the board, one line per row; closed cells never show
     *          their content
     */
    public format(mode: FormatMode = 'plain'): string {
        return render(this, mode);
    }

    public toString(): string {
        return this.format('plain');
    }

    private result(outcome: Outcome, changed: ReadonlyArray<number>): MoveResult {
        return {
            outcome,
            status: this.status(),
            changed: changed.map(index => coordinateOf(index, this.width)),
        };
    }

    private unchanged(outcome: Outcome): MoveResult {
        return this.result(outcome, []);
    }

    private indexOf(coordinate: Coordinate): number {
        if (!inBounds(coordinate, this.height, this.width)) {
            throw new BoardError('OutOfBoundsCoordinate', `(${coordinate[0]},${coordinate[1]}) is outside ${this.height}x${this.width}`);
        }
        return coordinate[0] * this.width + coordinate[1];
    }

    private neighborIndices(index: number): Array<number> {
        return neighbors(coordinateOf(index, this.width), this.height, this.width)
            .map(([r, c]) => r * this.width + c);
    }

    private contentAt(index: number): CellContent {
        const content = this.contents[index];
        assert(content !== undefined);
        return content;
    }

    private visibilityAt(index: number): Visibility {
        const visibility = this.visibility[index];
        assert(visibility !== undefined);
        return visibility;
    }
}

function isPositiveInteger(n: number): boolean {
    return Number.isInteger(n) && n > 0;
}

function checkMineCount(mineCount: number, cells: number): void {
    if (!Number.isInteger(mineCount) || mineCount < 0 || mineCount >= cells) {
        throw new BoardError('InvalidMineCount', `${mineCount} mines on ${cells} cells`);
    }
}

function coordinateOf(index: number, width: number): Coordinate {
    return [Math.floor(index / width), index % width];
}
