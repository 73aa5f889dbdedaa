import { Logger } from "../utils/Logger";

/**
 * Assigns palette colors to speakers in the order they first appear.
 *
 * The n-th distinct speaker gets `palette[n % palette.length]`; a speaker
 * seen again keeps its color. Create one instance per compilation run.
 */
export class SpeakerColorAssigner {
    private assigned = new Map<string, string>();
    private warnedOverflow = false;

    constructor(
        private readonly palette: readonly string[],
        private readonly maxSpeakers: number = Number.POSITIVE_INFINITY
    ) {
        if (palette.length === 0) {
            throw new RangeError("Speaker palette must contain at least one color");
        }
    }

    public colorFor(speaker: string): string {
        const known = this.assigned.get(speaker);
        if (known !== undefined) return known;

        const color = this.palette[this.assigned.size % this.palette.length];
        this.assigned.set(speaker, color);

        if (this.assigned.size > this.maxSpeakers && !this.warnedOverflow) {
            this.warnedOverflow = true;
            Logger.warn(`[SpeakerColorAssigner] More speakers than expected (${this.maxSpeakers}); "${speaker}" is speaker #${this.assigned.size}.`);
        }

        return color;
    }

    /** Speaker to color, in first-seen order. */
    public assignments(): ReadonlyMap<string, string> {
        return new Map(this.assigned);
    }
}
