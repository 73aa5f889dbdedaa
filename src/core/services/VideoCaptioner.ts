import { readFile, rm } from "fs/promises";
import path from "path";
import type { CaptionConfig } from "../config/CaptionConfig";
import type { TranscriptionProvider } from "../interfaces/TranscriptionProvider";
import type { VideoInspector, VideoRenderer } from "../interfaces/VideoTools";
import { Logger } from "../utils/Logger";
import { CaptionCompiler, type CaptionCompilerOptions, type CompilationReport } from "./CaptionCompiler";
import { writeDocumentAtomic } from "./DocumentWriter";
import { FFmpegToolkit } from "./FFmpegToolkit";
import { type CueGranularity, utterancesToSrt } from "./TranscriptSerializer";

export interface VideoCaptionerOptions extends CaptionCompilerOptions {
    inspector?: VideoInspector;
    renderer?: VideoRenderer;
}

export interface CaptionedVideo {
    videoPath: string;
    subtitlesPath: string;
    report: CompilationReport;
}

/**
 * End-to-end captioning: inspect the video, compile the subtitles, write
 * them next to the output and hand both to the renderer.
 */
export class VideoCaptioner {
    private readonly compiler: CaptionCompiler;
    private readonly inspector: VideoInspector;
    private readonly renderer: VideoRenderer;
    private writtenSubtitles: string[] = [];

    constructor(config: CaptionConfig, options: VideoCaptionerOptions = {}) {
        const toolkit = new FFmpegToolkit();
        this.compiler = new CaptionCompiler(config, options);
        this.inspector = options.inspector ?? toolkit;
        this.renderer = options.renderer ?? toolkit;
    }

    /**
     * @param outputPath Defaults to `<name>_captioned<ext>` beside the input.
     */
    public async addCaptions(videoPath: string, srtText: string, outputPath?: string): Promise<CaptionedVideo> {
        const target = outputPath ?? VideoCaptioner.defaultOutputPath(videoPath);
        const subtitlesPath = VideoCaptioner.subtitlesPathFor(target);

        const canvas = await this.inspector.dimensions(videoPath);
        const report = this.compiler.compile(srtText, canvas);

        await writeDocumentAtomic(subtitlesPath, report.document);
        this.writtenSubtitles.push(subtitlesPath);

        await this.renderer.render(videoPath, subtitlesPath, target);
        Logger.info(`[VideoCaptioner] Captioned video saved to ${target}`);

        return { videoPath: target, subtitlesPath, report };
    }

    public async addCaptionsFromFile(videoPath: string, srtPath: string, outputPath?: string): Promise<CaptionedVideo> {
        const srtText = await readFile(srtPath, "utf-8");
        return this.addCaptions(videoPath, srtText, outputPath);
    }

    /**
     * Transcribes the audio track (already extracted by the caller) and
     * captions the video with the result.
     */
    public async captionFromTranscript(
        videoPath: string,
        audioPath: string,
        provider: TranscriptionProvider,
        options: { outputPath?: string; granularity?: CueGranularity } = {}
    ): Promise<CaptionedVideo> {
        const { diarization } = this.compiler.getConfig();

        Logger.info(`[VideoCaptioner] Transcribing ${audioPath} with ${provider.name}`);
        const utterances = await provider.transcribe(audioPath, { maxSpeakers: diarization.maxSpeakers });
        const srtText = utterancesToSrt(utterances, options.granularity);

        return this.addCaptions(videoPath, srtText, options.outputPath);
    }

    /**
     * Removes the subtitle documents written by this instance.
     */
    public async cleanup(): Promise<void> {
        const paths = this.writtenSubtitles;
        this.writtenSubtitles = [];
        await Promise.all(paths.map(p => rm(p, { force: true })));
    }

    public static defaultOutputPath(videoPath: string): string {
        const { dir, name, ext } = path.parse(videoPath);
        return path.join(dir, `${name}_captioned${ext}`);
    }

    public static subtitlesPathFor(outputPath: string): string {
        const { dir, name } = path.parse(outputPath);
        return path.join(dir, `${name}.ass`);
    }
}
