import type { StyleConfig } from "../config/CaptionConfig";
import type { CanvasSize } from "../interfaces/VideoTools";
import type { StyledEvent } from "../models/Cue";
import { toAssColor } from "../utils/AssColor";
import { ValidationError } from "../utils/Errors";
import { formatAssTimestamp } from "../utils/Timecode";
import { DEFAULT_STYLE_NAME } from "./StyleCompiler";

/** Portrait 1080p, the usual short-form video canvas */
export const DEFAULT_CANVAS: Readonly<CanvasSize> = Object.freeze({ width: 1080, height: 1920 });

const STYLE_FORMAT = "Format: Name, Fontname, Fontsize, PrimaryColour, SecondaryColour, OutlineColour, BackColour, Bold, Italic, Underline, StrikeOut, ScaleX, ScaleY, Spacing, Angle, BorderStyle, Outline, Shadow, Alignment, MarginL, MarginR, MarginV, Encoding";
const EVENT_FORMAT = "Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text";

const SECONDARY_COLOUR = "&H000000FF";
const BACK_COLOUR = "&H00000000";
const ALIGNMENT_BOTTOM_CENTER = 2;
const MARGIN_HORIZONTAL = 10;

/**
 * Writes the Advanced SubStation Alpha document: script info, one style row,
 * and the event rows in the order given.
 */
export class DocumentAssembler {
    constructor(private readonly style: StyleConfig) { }

    public assemble(canvas: CanvasSize, events: readonly StyledEvent[]): string {
        if (!(canvas.width > 0 && canvas.height > 0)) {
            throw new ValidationError(`Canvas size must be positive, got ${canvas.width}x${canvas.height}`);
        }

        const lines = [
            "[Script Info]",
            "ScriptType: v4.00+",
            `PlayResX: ${canvas.width}`,
            `PlayResY: ${canvas.height}`,
            "ScaledBorderAndShadow: yes",
            "",
            "[V4+ Styles]",
            STYLE_FORMAT,
            this.styleLine(canvas.height),
            "",
            "[Events]",
            EVENT_FORMAT,
            ...events.map(event => DocumentAssembler.eventLine(event))
        ];

        return lines.join("\n") + "\n";
    }

    /**
     * The vertical position fraction becomes MarginV = floor(height * position).
     */
    public styleLine(canvasHeight: number): string {
        const s = this.style;
        const marginV = Math.floor(canvasHeight * s.position);

        const fields = [
            DEFAULT_STYLE_NAME,
            s.font,
            s.fontSize,
            DocumentAssembler.color(s.color),
            SECONDARY_COLOUR,
            DocumentAssembler.color(s.outlineColor),
            BACK_COLOUR,
            s.bold ? -1 : 0,
            s.italic ? -1 : 0,
            0, 0,               // underline, strikeout
            100, 100, 0, 0,     // scale x/y, spacing, angle
            1,                  // border style: outline + shadow
            s.outlineThickness,
            0,                  // shadow
            ALIGNMENT_BOTTOM_CENTER,
            MARGIN_HORIZONTAL,
            MARGIN_HORIZONTAL,
            marginV,
            1                   // encoding
        ];

        return `Style: ${fields.join(",")}`;
    }

    public static eventLine(event: StyledEvent): string {
        const start = formatAssTimestamp(event.start);
        const end = formatAssTimestamp(event.end);
        return `Dialogue: 0,${start},${end},${event.style},,0,0,0,,${event.text}`;
    }

    private static color(name: string): string {
        const code = toAssColor(name);
        if (code === null) {
            throw new ValidationError(`Unknown color "${name}"`);
        }
        return code;
    }
}
