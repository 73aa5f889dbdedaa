import type { CueList } from "../models/Cue";

/**
 * Interface for cue list parsing strategies.
 */
export interface CueParser {
    /**
     * Parses raw subtitle text into cues.
     * Malformed blocks are reported in `rejected`, never thrown.
     */
    parse(rawText: string): CueList;
}
