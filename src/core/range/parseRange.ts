// src/core/range/parseRange.ts

import { InputError } from '../../utils/errors/errors.ts';

export interface IPageRange {
    /** 1-based, inclusive. */
    start: number;
    /** 1-based, inclusive. */
    end: number;
}

const RANGE_PATTERN = /^\s*(\d+)\s*-\s*(\d+)\s*$/;

/**
 * Parses an inclusive `start-end` range such as `1-10`.
 *
 * @throws {InputError} When the string is not two positive integers joined by `-`, or start exceeds end.
 */
export function parseRange(raw: string): IPageRange {
    const match = RANGE_PATTERN.exec(raw);
    if (!match) {
        throw new InputError(`Invalid range format: ${raw}. Use start-end (e.g., 1-10)`);
    }
    const start = Number(match[1]);
    const end = Number(match[2]);
    if (start < 1 || end < start) {
        throw new InputError(`Invalid range: ${raw}. Start must be at least 1 and not greater than end`);
    }
    return { start, end };
}

/**
 * Returns the items covered by `range`. A range reaching past the last item is rejected.
 */
export function selectRange<T>(items: T[], range: IPageRange): T[] {
    if (range.end > items.length) {
        throw new InputError(
            `Range ${range.start}-${range.end} is out of bounds: only ${items.length} item(s) available`,
        );
    }
    return items.slice(range.start - 1, range.end);
}
