/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import assert from 'node:assert';
import { Board } from '../src/board.js';
import { neighbors } from '../src/cell.js';
import { EASY, HARD, MEDIUM, difficultyFromDensity, parseDifficulty } from '../src/difficulty.js';
import { BoardError } from '../src/errors.js';
import type { BoardErrorKind } from '../src/errors.js';
import { seededRandom } from '../src/random.js';
import type { RandomSource } from '../src/random.js';

function failsWith(kind: BoardErrorKind): (err: unknown) => boolean {
    return (err: unknown) => err instanceof BoardError && err.kind === kind;
}

// always picks the first remaining candidate, and counts how often it is asked
class FirstChoice implements RandomSource {
    public calls = 0;

    public nextInt(bound: number): number {
        assert.ok(bound > 0);
        ++this.calls;
        return 0;
    }
}

function countMines(board: Board): number {
    let mines = 0;
    for (let r = 0; r < board.height; ++r) {
        for (let c = 0; c < board.width; ++c) {
            if (board.content([r, c]).kind === 'mine') ++mines;
        }
    }
    return mines;
}

describe('random boards', function() {

    // Testing strategy
    //   source: seeded (same seed, different seeds), scripted
    //   safe start: absent, corner, centre, outside the grid, leaving too few cells
    //   mine count: 0, typical, too many
    //   difficulty: presets by name, unknown name, from density

    describe('seededRandom', function() {

        it('repeats its sequence for the same seed', function() {
            const a = seededRandom(42);
            const b = seededRandom(42);
            for (let i = 0; i < 100; ++i) {
                assert.strictEqual(a.nextInt(1000), b.nextInt(1000));
            }
        });

        it('differs between seeds', function() {
            const a = seededRandom(1);
            const b = seededRandom(2);
            const first = Array.from({ length: 20 }, () => a.nextInt(1_000_000));
            const second = Array.from({ length: 20 }, () => b.nextInt(1_000_000));
            assert.notDeepStrictEqual(first, second);
        });

        it('stays within the bound', function() {
            const random = seededRandom(7);
            for (let i = 0; i < 1000; ++i) {
                const n = random.nextInt(6);
                assert.ok(Number.isInteger(n) && n >= 0 && n < 6, `got ${n}`);
            }
        });
    });

    describe('Board.random', function() {

        it('draws exactly one number per mine', function() {
            const source = new FirstChoice();
            const board = Board.random(3, 3, 2, source);
            assert.strictEqual(source.calls, 2);
            assert.strictEqual(board.key(), '3x3:**.......');
        });

        it('draws nothing for a board without mines', function() {
            const source = new FirstChoice();
            Board.random(4, 4, 0, source);
            assert.strictEqual(source.calls, 0);
        });

        it('keeps the safe start and its neighbours free of mines', function() {
            const source = new FirstChoice();
            const board = Board.random(3, 3, 2, source, { safe: [0, 0] });
            assert.strictEqual(board.key(), '3x3:..*..*...');
            assert.deepStrictEqual(board.content([0, 0]), { kind: 'empty', adjacentMines: 0 });
        });

        it('builds the same board from the same seed', function() {
            const a = Board.fromDifficulty(HARD, seededRandom(2024));
            const b = Board.fromDifficulty(HARD, seededRandom(2024));
            assert.ok(a.equals(b));
            assert.strictEqual(countMines(a), 99);
            assert.strictEqual(a.mineCount, 99);
        });

        it('opens a zero cell first from a safe start', function() {
            const start = [8, 15] as const;
            const board = Board.fromDifficulty(HARD, seededRandom(5), { safe: start });
            assert.deepStrictEqual(board.content(start), { kind: 'empty', adjacentMines: 0 });
            for (const neighbor of neighbors(start, HARD.height, HARD.width)) {
                assert.notStrictEqual(board.content(neighbor).kind, 'mine');
            }
            const result = board.open(start);
            assert.ok(result.changed.length >= 9);
            assert.notStrictEqual(result.status, 'lost');
        });

        it('rejects invalid sizes and mine counts', function() {
            assert.throws(() => Board.random(0, 5, 1), failsWith('InvalidDimensions'));
            assert.throws(() => Board.random(3, 3, 9), failsWith('InvalidMineCount'));
            assert.throws(() => Board.random(3, 3, -1), failsWith('InvalidMineCount'));
            assert.throws(() => Board.random(3, 3, 1.5), failsWith('InvalidMineCount'));
        });

        it('rejects a safe start outside the grid or leaving too few cells', function() {
            assert.throws(() => Board.random(3, 3, 1, seededRandom(1), { safe: [3, 3] }), failsWith('OutOfBoundsCoordinate'));
            assert.throws(() => Board.random(2, 2, 1, seededRandom(1), { safe: [0, 0] }), failsWith('InvalidMineCount'));
        });
    });

    describe('difficulty', function() {

        it('looks up presets by name', function() {
            assert.strictEqual(parseDifficulty('easy'), EASY);
            assert.strictEqual(parseDifficulty(' Medium '), MEDIUM);
            assert.deepStrictEqual(parseDifficulty('HARD'), { height: 16, width: 30, mines: 99 });
            assert.throws(() => parseDifficulty('nightmare'), /unknown difficulty/);
        });

        it('derives a mine count from a density', function() {
            assert.deepStrictEqual(difficultyFromDensity(10, 10, 0.25), { height: 10, width: 10, mines: 25 });
            assert.deepStrictEqual(difficultyFromDensity(9, 9, 0.1), { height: 9, width: 9, mines: 8 });
        });

        it('builds a board of the preset size', function() {
            const board = Board.fromDifficulty(EASY, seededRandom(3));
            assert.strictEqual(board.height, 9);
            assert.strictEqual(board.width, 9);
            assert.strictEqual(countMines(board), 10);
        });
    });
});
