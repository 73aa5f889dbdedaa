import type { AnimationConfig, BounceProfile } from "../config/CaptionConfig";
import type { AnimationKeyframe, ScaleCurve } from "../interfaces/ScaleCurve";
import { ValidationError } from "../utils/Errors";

const BOUNCE_MAX = 100;
const BOUNCE_MIN = 80;

/**
 * Shrinks from 100% at the start, 90 points per cue duration, floored at 80%.
 */
export const monotonicBounce: ScaleCurve = (time, duration) =>
    Math.max(BOUNCE_MIN, BOUNCE_MAX - 90 * (time / duration));

/**
 * Down to 80% at the midpoint, back up to 100% at the end.
 */
export const symmetricBounce: ScaleCurve = (time, duration) => {
    const half = duration / 2;
    if (time < half) {
        return BOUNCE_MAX - (BOUNCE_MAX - BOUNCE_MIN) * (time / half);
    }
    return BOUNCE_MIN + (BOUNCE_MAX - BOUNCE_MIN) * ((time - half) / half);
};

export const BOUNCE_CURVES: Record<BounceProfile, ScaleCurve> = {
    monotonic: monotonicBounce,
    symmetric: symmetricBounce
};

/**
 * Computes scale keyframes over a cue and renders them as ASS `\t` transforms.
 */
export class AnimationEngine {
    private readonly curve: ScaleCurve;

    /**
     * @param curve Overrides the curve selected by `config.profile`.
     */
    constructor(private readonly config: AnimationConfig, curve?: ScaleCurve) {
        this.curve = curve ?? BOUNCE_CURVES[config.profile];
    }

    public get active(): boolean {
        return this.config.enabled && this.config.type !== "none";
    }

    /**
     * `keyframes` points evenly spaced from 0 to `duration` inclusive.
     * @throws ValidationError for a non-positive duration or fewer than 2 keyframes.
     */
    public keyframes(duration: number): AnimationKeyframe[] {
        const count = this.config.keyframes;
        if (!Number.isInteger(count) || count < 2) {
            throw new ValidationError(`Animation needs at least 2 keyframes, got ${count}`);
        }
        if (!(duration > 0)) {
            throw new ValidationError(`Cue duration must be positive, got ${duration}ms`);
        }

        const frames: AnimationKeyframe[] = [];
        for (let j = 0; j < count; j++) {
            // Pin the last frame so float error cannot push it past the cue end
            const time = j === count - 1 ? duration : (j * duration) / (count - 1);
            const scale = this.curve(time, duration);
            frames.push({ time, scaleX: scale, scaleY: scale });
        }
        return frames;
    }

    /**
     * Renders the override tokens for a cue. Each keyframe becomes
     * `{\t(from,to,\fscxS\fscyS)}`, animating from the previous keyframe's
     * time to its own, in ms relative to the cue start.
     * @param baseScale Auto font scale in percent; keyframe scales are multiplied by it.
     */
    public render(duration: number, baseScale: number = 100): string {
        if (!this.active) return "";

        let previous = 0;
        return this.keyframes(duration)
            .map(frame => {
                const from = Math.round(previous);
                const to = Math.round(frame.time);
                previous = frame.time;
                const x = Math.round((frame.scaleX * baseScale) / 100);
                const y = Math.round((frame.scaleY * baseScale) / 100);
                return `{\\t(${from},${to},\\fscx${x}\\fscy${y})}`;
            })
            .join("");
    }
}
