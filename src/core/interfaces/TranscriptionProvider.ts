export interface TranscribedWord {
    text: string;

    /** Absolute start time in ms */
    start: number;

    /** Absolute end time in ms */
    end: number;
}

/**
 * A stretch of speech attributed to one speaker.
 */
export interface Utterance {
    /** Speaker label, e.g. "Speaker A" */
    speaker: string;
    start: number;
    end: number;
    words: TranscribedWord[];
}

export interface TranscriptionOptions {
    maxSpeakers: number;
}

/**
 * A speech-to-text service with speaker diarization.
 */
export interface TranscriptionProvider {
    name: string;

    transcribe(audioPath: string, options: TranscriptionOptions): Promise<Utterance[]>;
}
