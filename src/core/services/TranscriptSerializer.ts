import type { Utterance } from "../interfaces/TranscriptionProvider";
import type { Cue } from "../models/Cue";
import { SrtParser } from "../parsers/SrtParser";
import { formatSrtTimestamp } from "../utils/Timecode";
import { SpeakerColorAssigner } from "./SpeakerColorAssigner";
import { TextProcessor } from "./TextProcessor";

export type CueGranularity = "word" | "utterance";

/**
 * Serializes cues back to SRT text, numbering them in order.
 */
export function cuesToSrt(cues: readonly Pick<Cue, "start" | "end" | "text">[]): string {
    return cues
        .map((cue, i) => `${i + 1}\n${formatSrtTimestamp(cue.start)} --> ${formatSrtTimestamp(cue.end)}\n${cue.text.join("\n")}\n`)
        .join("\n");
}

/**
 * Converts diarized utterances to SRT with `Speaker: text` lines.
 * With "word" granularity every word becomes its own cue, which suits the
 * one-word-at-a-time caption look; "utterance" keeps each utterance whole.
 */
export function utterancesToSrt(utterances: readonly Utterance[], granularity: CueGranularity = "word"): string {
    const cues: Pick<Cue, "start" | "end" | "text">[] = [];

    for (const utterance of utterances) {
        if (granularity === "utterance" || utterance.words.length === 0) {
            const text = utterance.words.length > 0
                ? utterance.words.map(w => w.text).join(" ")
                : "";
            if (!text) continue;
            cues.push({ start: utterance.start, end: utterance.end, text: [`${utterance.speaker}: ${text}`] });
            continue;
        }

        for (const word of utterance.words) {
            cues.push({ start: word.start, end: word.end, text: [`${utterance.speaker}: ${word.text}`] });
        }
    }

    return cuesToSrt(cues);
}

/**
 * Wraps each `Speaker: text` cue in `<font color="...">`, handing out palette
 * colors in first-seen speaker order. Cues without a speaker label are kept
 * as they are; malformed blocks are dropped.
 */
export function applySpeakerColors(srtText: string, palette: readonly string[]): string {
    const { cues } = new SrtParser().parse(srtText);
    const assigner = new SpeakerColorAssigner(palette);

    const styled = cues.map(cue => {
        const { speaker } = TextProcessor.extractSpeaker(cue.text[0] ?? "");
        if (speaker === undefined) return cue;

        const color = assigner.colorFor(speaker);
        return { ...cue, text: [`<font color="${color}">${cue.text.join("\n")}</font>`] };
    });

    return cuesToSrt(styled);
}
