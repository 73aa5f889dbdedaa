import type { StyleConfig } from "../config/CaptionConfig";
import type { Cue, ProcessedCue } from "../models/Cue";
import { stripMarkup } from "../parsers/MarkupTokenizer";

/**
 * Normalizes cue text for display.
 *
 * Markup is stripped first (remembering an explicit font color), then a
 * leading `Label: ` is split off as the speaker, then words are regrouped
 * into lines and the auto font scale is computed.
 */
export class TextProcessor {
    // "Speaker 1", "Speaker B" or a single name token such as "Alice"
    private static SPEAKER_REGEX = /^(Speaker\s+[A-Za-z0-9]+|[A-Za-z][\w'.-]{0,31}):\s+(\S.*)$/;
    private static TERMINAL_PUNCTUATION = /[.!?:;]$/;

    private static SCALE_FREE_CHARS = 5;
    private static SCALE_STEP = 1.5;
    private static SCALE_FLOOR = 70;

    constructor(private readonly style: Pick<StyleConfig, "autoScaleFont" | "maxWordsPerLine">) { }

    public process(cue: Cue): ProcessedCue {
        const { text, color } = stripMarkup(cue.text.join("\n"));

        let sourceLines = text
            .split("\n")
            .map(line => line.replace(/\s+/g, " ").trim())
            .filter(line => line.length > 0);

        const { speaker, remainder } = TextProcessor.extractSpeaker(sourceLines[0] ?? "");
        if (speaker !== undefined) {
            sourceLines = [remainder, ...sourceLines.slice(1)];
        }

        const lines = this.style.maxWordsPerLine === undefined
            ? sourceLines
            : TextProcessor.groupWords(sourceLines.join(" "), this.style.maxWordsPerLine);

        const fontScale = this.style.autoScaleFont
            ? TextProcessor.autoScale(lines.join(""))
            : 100;

        return {
            ...cue,
            speaker: speaker ?? cue.speaker,
            colorOverride: color ?? cue.colorOverride,
            lines,
            fontScale
        };
    }

    /**
     * Splits `"<label>: <remainder>"`. Lines without a label come back unchanged.
     */
    public static extractSpeaker(line: string): { speaker?: string; remainder: string } {
        const match = TextProcessor.SPEAKER_REGEX.exec(line);
        if (!match) return { remainder: line };
        return { speaker: match[1].replace(/\s+/g, " "), remainder: match[2] };
    }

    /**
     * Packs words into lines of at most `maxWords` words. A word ending in
     * `. ! ? : ;` closes its line early.
     */
    public static groupWords(text: string, maxWords: number): string[] {
        const cap = Math.max(1, maxWords);
        const lines: string[] = [];
        let current: string[] = [];

        for (const word of text.split(/\s+/).filter(w => w.length > 0)) {
            current.push(word);
            if (current.length >= cap || TextProcessor.TERMINAL_PUNCTUATION.test(word)) {
                lines.push(current.join(" "));
                current = [];
            }
        }
        if (current.length > 0) lines.push(current.join(" "));

        return lines;
    }

    /**
     * Font scale in percent for text of the given length: 100 up to 5
     * characters, then 1.5 points less per extra character, never below 70.
     */
    public static autoScale(text: string): number {
        const length = [...text.replace(/\n/g, "")].length;
        if (length <= TextProcessor.SCALE_FREE_CHARS) return 100;

        const scale = 100 - TextProcessor.SCALE_STEP * (length - TextProcessor.SCALE_FREE_CHARS);
        return Math.max(TextProcessor.SCALE_FLOOR, scale);
    }
}
