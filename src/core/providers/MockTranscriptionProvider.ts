import type { TranscriptionOptions, TranscriptionProvider, Utterance } from "../interfaces/TranscriptionProvider";

/**
 * Returns a fixed two-speaker transcript. For demos and tests.
 */
export class MockTranscriptionProvider implements TranscriptionProvider {
    public name = "MockTranscription";
    public lastRequest: { audioPath: string; options: TranscriptionOptions } | null = null;

    constructor(private readonly delayMs: number = 0) { }

    public async transcribe(audioPath: string, options: TranscriptionOptions): Promise<Utterance[]> {
        this.lastRequest = { audioPath, options };

        if (this.delayMs > 0) {
            await new Promise(resolve => setTimeout(resolve, this.delayMs));
        }

        return [
            {
                speaker: "Speaker A",
                start: 0,
                end: 1000,
                words: [
                    { text: "Hello", start: 0, end: 400 },
                    { text: "there!", start: 400, end: 1000 }
                ]
            },
            {
                speaker: "Speaker B",
                start: 1200,
                end: 1800,
                words: [
                    { text: "Hi!", start: 1200, end: 1800 }
                ]
            }
        ];
    }
}
