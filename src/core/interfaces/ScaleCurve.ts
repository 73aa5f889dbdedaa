/**
 * Scale in percent at `time` ms into a cue lasting `duration` ms.
 * Design Pattern: Strategy Pattern.
 */
export type ScaleCurve = (time: number, duration: number) => number;

export interface AnimationKeyframe {
    /** Offset from the cue start in ms */
    time: number;
    scaleX: number;
    scaleY: number;
}
