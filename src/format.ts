/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import type { CellGrid, CellView } from './cell.js';

/**
 * Text renderings of a board.
 *
 *  - plain: C closed, F flagged, blank for an open 0, digits for counts, M for an open mine
 *  - numeric: as plain, but an open 0 shows as 0
 *  - emoji: coloured squares and keycap digits
 *  - annotated: numeric glyphs with row and column indices
 */
export type FormatMode = 'plain' | 'numeric' | 'emoji' | 'annotated';

interface Glyphs {
    readonly closed: string;
    readonly flagged: string;
    readonly mine: string;
    // counts[n] is the glyph for an open cell with n adjacent mines
    readonly counts: ReadonlyArray<string>;
}

const DIGITS = ['0', '1', '2', '3', '4', '5', '6', '7', '8'];

const PLAIN: Glyphs = { closed: 'C', flagged: 'F', mine: 'M', counts: [' ', ...DIGITS.slice(1)] };
const NUMERIC: Glyphs = { closed: 'C', flagged: 'F', mine: 'M', counts: DIGITS };
const EMOJI: Glyphs = {
    closed: '\u{1F7EA}',
    flagged: '\u{1F7E8}',
    mine: '\u{1F7E5}',
    counts: ['\u{1F7E9}', ...DIGITS.slice(1).map(d => `${d}\uFE0F\u20E3`)],
};

const GLYPHS: Record<FormatMode, Glyphs> = {
    plain: PLAIN,
    numeric: NUMERIC,
    emoji: EMOJI,
    annotated: NUMERIC,
};

function glyph(view: CellView, glyphs: Glyphs): string {
    switch (view.visibility) {
        case 'closed':
            return glyphs.closed;
        case 'flagged':
            return glyphs.flagged;
        case 'open': {
            const content = view.content;
            if (content.kind === 'mine') {
                return glyphs.mine;
            }
            const count = glyphs.counts[content.adjacentMines];
            return count ?? String(content.adjacentMines);
        }
    }
}

/**
 * Project a board to text, walking its cells in row-major order.
 *
 * Closed cells never reveal their content. Cells on a row are separated by one space and
 * every row, including the annotated header, ends with a newline.
 *
 * @param grid board to render; not mutated
 * @param mode which glyph set and layout to use
 * @returns one line per row (plus a header line in annotated mode)
 */
export function render(grid: CellGrid, mode: FormatMode = 'plain'): string {
    const glyphs = GLYPHS[mode];
    const annotated = mode === 'annotated';
    const rowLabelWidth = String(grid.height - 1).length;
    const cellWidth = annotated ? String(grid.width - 1).length : 1;

    const lines: string[] = [];
    if (annotated) {
        const header: string[] = [];
        for (let c = 0; c < grid.width; ++c) {
            header.push(String(c).padStart(cellWidth));
        }
        lines.push(`${' '.repeat(rowLabelWidth)} ${header.join(' ')}`);
    }
    for (let r = 0; r < grid.height; ++r) {
        const cells: string[] = [];
        for (let c = 0; c < grid.width; ++c) {
            const text = glyph(grid.cell([r, c]), glyphs);
            cells.push(annotated ? text.padStart(cellWidth) : text);
        }
        const row = cells.join(' ');
        lines.push(annotated ? `${String(r).padStart(rowLabelWidth)} ${row}` : row);
    }
    return lines.join('\n') + '\n';
}
