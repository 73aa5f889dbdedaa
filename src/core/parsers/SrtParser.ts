import type { CueParser } from "../interfaces/CueParser";
import type { Cue, CueList } from "../models/Cue";
import { ParseError } from "../utils/Errors";
import { Logger } from "../utils/Logger";
import { parseSrtTimestamp } from "../utils/Timecode";

/**
 * Parses SubRip text:
 *
 * ```
 * 1
 * 00:00:01,000 --> 00:00:04,000
 * Hello, world!
 * ```
 *
 * Blocks are separated by blank lines. A malformed block is skipped and
 * reported; the blocks after it are still read.
 */
export class SrtParser implements CueParser {
    private static INDEX_REGEX = /^\d+$/;
    private static ARROW = "-->";

    public parse(rawText: string): CueList {
        const cues: Cue[] = [];
        const rejected: ParseError[] = [];

        const normalized = rawText.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
        const blocks = normalized
            .split(/\n[ \t]*\n/)
            .map(block => block.split("\n").filter(line => line.trim() !== ""))
            .filter(lines => lines.length > 0);

        blocks.forEach((lines, i) => {
            try {
                cues.push(this.parseBlock(lines, i + 1));
            } catch (e) {
                if (!(e instanceof ParseError)) throw e;
                Logger.warn(`[SrtParser] Skipping malformed block: ${e.message}`);
                rejected.push(e);
            }
        });

        if (rejected.length > 0) {
            Logger.info(`[SrtParser] Parsed ${cues.length} cues, skipped ${rejected.length} blocks.`);
        }

        return { cues, rejected };
    }

    private parseBlock(lines: string[], block: number): Cue {
        const indexLine = lines[0].trim();
        if (!SrtParser.INDEX_REGEX.test(indexLine) || parseInt(indexLine, 10) === 0) {
            throw new ParseError(block, `invalid cue index "${indexLine}"`);
        }
        const index = parseInt(indexLine, 10);

        const timingLine = lines[1];
        if (timingLine === undefined || !timingLine.includes(SrtParser.ARROW)) {
            throw new ParseError(block, `cue ${index} has no "start --> end" line`);
        }

        const [startText, endText] = timingLine.split(SrtParser.ARROW);
        const start = parseSrtTimestamp(startText);
        // Position hints may follow the end timestamp
        const end = parseSrtTimestamp(endText.trim().split(/\s+/)[0] ?? "");
        if (start === null || end === null) {
            throw new ParseError(block, `cue ${index} has a malformed timestamp "${timingLine.trim()}"`);
        }

        const text = lines.slice(2).map(line => line.trim());
        if (text.length === 0) {
            throw new ParseError(block, `cue ${index} has no text`);
        }

        return { index, start, end, text };
    }
}
