import type { CaptionConfig } from "../config/CaptionConfig";
import type { CueOutcome, ProcessedCue, StyledEvent } from "../models/Cue";
import { durationOf } from "../models/Cue";
import { sameColor, toAssColor } from "../utils/AssColor";
import { ValidationError } from "../utils/Errors";
import { Logger } from "../utils/Logger";
import { AnimationEngine } from "./AnimationEngine";

export const DEFAULT_STYLE_NAME = "Default";

/**
 * Turns a processed cue into an event row.
 *
 * Override tokens come in a fixed order: color, then the standalone auto
 * scale (only when no animation runs, since the animation already folds the
 * scale in), then the animation keyframes. The display text follows.
 */
export class StyleCompiler {
    private readonly animation: AnimationEngine;

    constructor(private readonly config: CaptionConfig, animation?: AnimationEngine) {
        this.animation = animation ?? new AnimationEngine(config.animation);
    }

    /**
     * @param speakerColor Palette color assigned to the cue's speaker, if any.
     */
    public compile(cue: ProcessedCue, speakerColor?: string): CueOutcome {
        try {
            return { status: "styled", event: this.buildEvent(cue, speakerColor) };
        } catch (e) {
            if (!(e instanceof ValidationError)) throw e;

            const reason = e.cueIndex === cue.index
                ? e
                : new ValidationError(e.message, { cueIndex: cue.index, issues: e.issues });
            Logger.warn(`[StyleCompiler] Skipping cue ${cue.index}: ${reason.message}`);
            return { status: "skipped", index: cue.index, reason };
        }
    }

    private buildEvent(cue: ProcessedCue, speakerColor?: string): StyledEvent {
        const duration = durationOf(cue);
        if (duration <= 0) {
            throw new ValidationError(`Cue duration must be positive, got ${duration}ms`, { cueIndex: cue.index });
        }
        if (cue.lines.length === 0) {
            throw new ValidationError("Cue has no displayable text", { cueIndex: cue.index });
        }

        let overrides = this.colorToken(cue, speakerColor);

        if (cue.fontScale < 100 && !this.animation.active) {
            const scale = Math.round(cue.fontScale);
            overrides += `{\\fscx${scale}\\fscy${scale}}`;
        }

        overrides += this.animation.render(duration, cue.fontScale);

        return {
            index: cue.index,
            start: cue.start,
            end: cue.end,
            style: DEFAULT_STYLE_NAME,
            text: overrides + this.displayText(cue)
        };
    }

    private colorToken(cue: ProcessedCue, speakerColor?: string): string {
        let explicit: string | null = null;
        if (cue.colorOverride !== undefined) {
            explicit = toAssColor(cue.colorOverride);
            if (explicit === null) {
                Logger.warn(`[StyleCompiler] Cue ${cue.index}: ignoring unknown color "${cue.colorOverride}"`);
            }
        }

        if (explicit !== null && cue.colorOverride !== undefined) {
            const differs = !sameColor(cue.colorOverride, this.config.style.color);
            return differs || speakerColor !== undefined ? `{\\c${explicit}}` : "";
        }

        if (speakerColor !== undefined) {
            const assigned = toAssColor(speakerColor);
            if (assigned === null) {
                throw new ValidationError(`Unknown speaker color "${speakerColor}"`, { cueIndex: cue.index });
            }
            return `{\\c${assigned}}`;
        }

        return "";
    }

    private displayText(cue: ProcessedCue): string {
        const text = cue.lines.join("\\N");
        const { enabled, keepSpeakerLabels } = this.config.diarization;

        if (enabled && keepSpeakerLabels && cue.speaker !== undefined) {
            return `${cue.speaker}: ${text}`;
        }
        return text;
    }
}
