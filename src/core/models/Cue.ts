import type { ParseError, ValidationError } from "../utils/Errors";

/**
 * A single timed subtitle cue as read from the source text.
 */
export interface Cue {
    /** Sequence number from the source (positive) */
    readonly index: number;

    /** Absolute start time in ms */
    readonly start: number;

    /** Absolute end time in ms */
    readonly end: number;

    /** Text lines, in source order */
    readonly text: readonly string[];

    /** Speaker label, e.g. "Speaker 1" */
    readonly speaker?: string;

    /** Explicit color taken from inline markup, as written (name, #hex or ASS code) */
    readonly colorOverride?: string;
}

/**
 * A cue after text processing: markup removed, speaker split off, lines regrouped.
 */
export interface ProcessedCue extends Cue {
    /** Display lines, without markup or speaker label */
    readonly lines: readonly string[];

    /** Baseline font scale in percent (100 = unscaled) */
    readonly fontScale: number;
}

/**
 * One event row of the output document.
 */
export interface StyledEvent {
    readonly index: number;
    readonly start: number;
    readonly end: number;
    readonly style: string;

    /** Override tokens followed by the display text */
    readonly text: string;
}

export type CueOutcome =
    | { readonly status: "styled"; readonly event: StyledEvent }
    | { readonly status: "skipped"; readonly index: number; readonly reason: ValidationError };

/**
 * Result of parsing a cue list. Rejected blocks do not stop the parse.
 */
export interface CueList {
    cues: Cue[];
    rejected: ParseError[];
}

export function durationOf(cue: Cue): number {
    return cue.end - cue.start;
}
