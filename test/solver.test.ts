/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import assert from 'node:assert';
import { Board } from '../src/board.js';
import { MEDIUM } from '../src/difficulty.js';
import { seededRandom } from '../src/random.js';
import { configFromEnv, simulate } from '../src/simulation.js';
import { deduce, solve } from '../src/solver.js';

/**
 * Tests for the deducing solver and the seeded simulation built on it.
 */
describe('solver', function() {

    // Testing strategy
    //   deduce: finds mines, finds safe cells, finds nothing
    //   solve: finishes by deduction alone, stuck without a random source, finishes by guessing
    //   simulate: several games, summary adds up
    //   configFromEnv: defaults, presets, overrides, bad numbers

    //   * * 1
    //   2 2 1
    //   0 0 0
    const TOP_PAIR = '3x3\n**.\n...\n...\n';

    it('deduces mines from a cell whose closed neighbours must all be mines', function() {
        const board = Board.parse(TOP_PAIR);
        board.open([2, 2]);
        assert.deepStrictEqual(deduce(board), { safe: [], mines: [[0, 0], [0, 1]] });
    });

    it('deduces safe cells once the flags satisfy a count', function() {
        const board = Board.parse(TOP_PAIR);
        board.open([2, 2]);
        board.flag([0, 0]);
        board.flag([0, 1]);
        assert.deepStrictEqual(deduce(board), { safe: [[0, 2]], mines: [] });
    });

    it('deduces nothing on a closed board', function() {
        assert.deepStrictEqual(deduce(Board.parse(TOP_PAIR)), { safe: [], mines: [] });
    });

    it('finishes a board by deduction alone', function() {
        const board = Board.parse(TOP_PAIR);
        board.open([2, 2]);
        assert.deepStrictEqual(solve(board), { status: 'won', guesses: 0, moves: 3 });
        assert.deepStrictEqual(board.counts(), { opened: 7, flagged: 2, minesLeft: 0 });
    });

    it('stops when stuck without a random source', function() {
        const board = Board.parse('2x3\n*.*\n...\n');
        board.open([1, 1]);
        const before = board.key();
        assert.deepStrictEqual(solve(board), { status: 'in-progress', guesses: 0, moves: 0 });
        assert.strictEqual(board.key(), before);
    });

    it('guesses until the game ends when given a random source', function() {
        const board = Board.parse('2x3\n*.*\n...\n');
        board.open([1, 1]);
        const report = solve(board, seededRandom(5));
        assert.notStrictEqual(report.status, 'in-progress');
        assert.strictEqual(report.status, board.status());
        assert.ok(report.guesses >= 1);
    });

    describe('simulation', function() {

        it('plays every game to the end', function() {
            const summary = simulate({
                difficulty: { height: 5, width: 5, mines: 3 },
                games: 4,
                seed: 11,
                verbose: false,
                compact: false,
            });
            assert.strictEqual(summary.games, 4);
            assert.strictEqual(summary.won + summary.lost, 4);
            assert.strictEqual(summary.stuck, 0);
        });

        it('repeats its results for the same seed', function() {
            const config = { difficulty: MEDIUM, games: 3, seed: 21, verbose: false, compact: false };
            assert.deepStrictEqual(simulate(config), simulate(config));
        });

        it('reads its configuration from the environment', function() {
            assert.deepStrictEqual(configFromEnv({ DIFFICULTY: 'medium', GAMES: '3', SEED: '9', SIM_COMPACT: '1' }), {
                difficulty: { height: 16, width: 16, mines: 40 },
                games: 3,
                seed: 9,
                verbose: false,
                compact: true,
            });
            assert.deepStrictEqual(configFromEnv({}), {
                difficulty: { height: 9, width: 9, mines: 10 },
                games: 10,
                seed: 1,
                verbose: false,
                compact: false,
            });
            assert.deepStrictEqual(configFromEnv({ HEIGHT: '4', MINES: '2', VERBOSE: '1' }).difficulty, {
                height: 4,
                width: 9,
                mines: 2,
            });
            assert.strictEqual(configFromEnv({ VERBOSE: '1' }).verbose, true);
        });

        it('rejects a variable that is not an integer', function() {
            assert.throws(() => configFromEnv({ GAMES: 'ten' }), /GAMES must be an integer/);
            assert.throws(() => configFromEnv({ DIFFICULTY: 'impossible' }), /unknown difficulty/);
        });
    });
});
