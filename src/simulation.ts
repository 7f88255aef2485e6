/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import process from 'node:process';
import { pathToFileURL } from 'node:url';
import { Board } from './board.js';
import { parseDifficulty } from './difficulty.js';
import type { Difficulty } from './difficulty.js';
import { seededRandom } from './random.js';
import { solve } from './solver.js';

export interface SimulationConfig {
    readonly difficulty: Difficulty;
    readonly games: number;
    // game i is played with seededRandom(seed + i)
    readonly seed: number;
    readonly verbose: boolean;
    readonly compact: boolean;
}

export interface SimulationSummary {
    readonly games: number;
    readonly won: number;
    readonly lost: number;
    // games the solver gave up on; only possible without guessing
    readonly stuck: number;
    readonly guesses: number;
}

/**
 * Play several seeded games with the solver, starting each from the centre cell with a
 * safe start.
 *
 * @param config board size, number of games, seed and logging switches
 * @returns how the games ended
 */
export function simulate(config: SimulationConfig): SimulationSummary {
    const { height, width, mines } = config.difficulty;
    const start = [Math.floor(height / 2), Math.floor(width / 2)] as const;
    let won = 0;
    let lost = 0;
    let stuck = 0;
    let guesses = 0;

    for (let game = 0; game < config.games; ++game) {
        const random = seededRandom(config.seed + game);
        const board = Board.random(height, width, mines, random, { safe: start });
        board.open(start);
        const report = solve(board, random);
        guesses += report.guesses;
        switch (report.status) {
            case 'won': ++won; break;
            case 'lost': ++lost; break;
            case 'in-progress': ++stuck; break;
        }
        if (config.compact) {
            console.log(`game=${game} ${report.status} guesses=${report.guesses}`);
        } else if (config.verbose) {
            console.log(`game=${game} status=${report.status} moves=${report.moves} guesses=${report.guesses}`);
            console.log(board.format('annotated'));
        }
    }
    return { games: config.games, won, lost, stuck, guesses };
}

/**
 * Read a simulation configuration from environment variables:
 * DIFFICULTY (easy, medium or hard), HEIGHT, WIDTH and MINES overriding it, GAMES, SEED,
 * SIM_VERBOSE or VERBOSE, and SIM_COMPACT.
 *
 * @throws Error if a variable is not a valid number or difficulty name
 */
export function configFromEnv(env: NodeJS.ProcessEnv): SimulationConfig {
    const preset = parseDifficulty(env['DIFFICULTY'] ?? 'easy');
    const difficulty: Difficulty = {
        height: numberFrom(env, 'HEIGHT', preset.height),
        width: numberFrom(env, 'WIDTH', preset.width),
        mines: numberFrom(env, 'MINES', preset.mines),
    };
    return {
        difficulty,
        games: numberFrom(env, 'GAMES', 10),
        seed: numberFrom(env, 'SEED', 1),
        verbose: env['SIM_VERBOSE'] === '1' || env['VERBOSE'] === '1',
        compact: env['SIM_COMPACT'] === '1',
    };
}

function numberFrom(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
    const text = env[name];
    if (text === undefined) {
        return fallback;
    }
    const value = Number(text);
    if (!Number.isInteger(value)) {
        throw new Error(`${name} must be an integer, got "${text}"`);
    }
    return value;
}

/**
 * Command-line usage:
 *     npm run simulate
 * configured through the environment variables read by configFromEnv, e.g.
 *     DIFFICULTY=hard GAMES=50 SIM_COMPACT=1 npm run simulate
 */
function simulationMain(): void {
    const config = configFromEnv(process.env);
    if (config.compact) console.log('SIM_COMPACT=1 (compact per-game logging)');
    if (config.verbose) console.log('SIM_VERBOSE=1 (verbose logging)');
    const { height, width, mines } = config.difficulty;
    const summary = simulate(config);
    console.log(`simulation finished: ${height}x${width} mines=${mines} games=${summary.games}`);
    console.log(`won=${summary.won} lost=${summary.lost} stuck=${summary.stuck} guesses=${summary.guesses}`);
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
    try {
        simulationMain();
    } catch (err) {
        console.error('simulation encountered an error:', err);
        process.exitCode = 1;
    }
}
