import type { CaptionConfig } from "../config/CaptionConfig";
import type { CueParser } from "../interfaces/CueParser";
import type { FontCatalog } from "../interfaces/FontCatalog";
import type { ScaleCurve } from "../interfaces/ScaleCurve";
import type { CanvasSize } from "../interfaces/VideoTools";
import type { CueOutcome, StyledEvent } from "../models/Cue";
import { SrtParser } from "../parsers/SrtParser";
import { ValidationError } from "../utils/Errors";
import { Logger } from "../utils/Logger";
import { AnimationEngine } from "./AnimationEngine";
import { BundledFontCatalog } from "./BundledFontCatalog";
import { DEFAULT_CANVAS, DocumentAssembler } from "./DocumentAssembler";
import { SpeakerColorAssigner } from "./SpeakerColorAssigner";
import { StyleCompiler } from "./StyleCompiler";
import { TextProcessor } from "./TextProcessor";

export interface SkippedCue {
    stage: "parse" | "style";

    /** Cue index for styling failures, block number for parse failures */
    index: number;

    reason: string;
}

export interface CompilationReport {
    /** The complete ASS document */
    document: string;

    /** Number of event rows written */
    eventCount: number;

    skipped: SkippedCue[];

    /** Speaker to palette color, in first-seen order (empty when diarization is off) */
    speakerColors: ReadonlyMap<string, string>;
}

export interface CaptionCompilerOptions {
    fonts?: FontCatalog;
    parser?: CueParser;

    /** Replaces the bounce curve selected by the animation config */
    curve?: ScaleCurve;
}

/**
 * Main facade: SRT text in, ASS document out.
 *
 * Every stage except speaker coloring is a pure per-cue transform; colors
 * are assigned in cue order by an assigner that lives for one `compile` call,
 * so compiling the same input twice gives byte-identical output.
 */
export class CaptionCompiler {
    private readonly fonts: FontCatalog;
    private readonly parser: CueParser;
    private readonly textProcessor: TextProcessor;
    private readonly styleCompiler: StyleCompiler;
    private readonly assembler: DocumentAssembler;

    constructor(private readonly config: CaptionConfig, options: CaptionCompilerOptions = {}) {
        this.fonts = options.fonts ?? new BundledFontCatalog();
        this.parser = options.parser ?? new SrtParser();
        this.textProcessor = new TextProcessor(config.style);
        this.styleCompiler = new StyleCompiler(config, new AnimationEngine(config.animation, options.curve));
        this.assembler = new DocumentAssembler(config.style);
    }

    public getConfig(): CaptionConfig {
        return this.config;
    }

    /**
     * @throws ValidationError if the configured font is not in the catalog.
     */
    public compile(srtText: string, canvas: CanvasSize = DEFAULT_CANVAS): CompilationReport {
        this.validateFont();

        const { cues, rejected } = this.parser.parse(srtText);
        const skipped: SkippedCue[] = rejected.map(error => ({
            stage: "parse",
            index: error.block,
            reason: error.message
        }));

        const { diarization } = this.config;
        const assigner = new SpeakerColorAssigner(diarization.colors, diarization.maxSpeakers);

        const events: StyledEvent[] = [];
        for (const cue of cues) {
            const processed = this.textProcessor.process(cue);

            // Colors are handed out in cue order, whether or not the cue is later skipped
            const speakerColor = diarization.enabled && processed.speaker !== undefined
                ? assigner.colorFor(processed.speaker)
                : undefined;

            const outcome: CueOutcome = this.styleCompiler.compile(processed, speakerColor);
            if (outcome.status === "styled") {
                events.push(outcome.event);
            } else {
                skipped.push({ stage: "style", index: outcome.index, reason: outcome.reason.message });
            }
        }

        const document = this.assembler.assemble(canvas, events);

        if (skipped.length > 0) {
            Logger.warn(`[CaptionCompiler] Wrote ${events.length} events, skipped ${skipped.length}.`, skipped);
        } else {
            Logger.info(`[CaptionCompiler] Wrote ${events.length} events.`);
        }

        return {
            document,
            eventCount: events.length,
            skipped,
            speakerColors: assigner.assignments()
        };
    }

    private validateFont() {
        const font = this.config.style.font;
        if (!this.fonts.has(font)) {
            throw new ValidationError(`Font not available: ${font}`, {
                issues: [`style.font: expected one of ${this.fonts.list().join(", ")}`]
            });
        }
    }
}
