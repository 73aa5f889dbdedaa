import { spawn } from "child_process";
import type { CanvasSize, CommandResult, CommandRunner, VideoInspector, VideoRenderer } from "../interfaces/VideoTools";
import { Logger } from "../utils/Logger";

/**
 * Spawns a program and collects its output. Rejects only if the program
 * cannot be started; a non-zero exit is reported through `exitCode`.
 */
export const spawnCommand: CommandRunner = (command, args) =>
    new Promise<CommandResult>((resolve, reject) => {
        const child = spawn(command, [...args], { stdio: ["ignore", "pipe", "pipe"] });
        let stdout = "";
        let stderr = "";

        child.stdout.setEncoding("utf-8");
        child.stderr.setEncoding("utf-8");
        child.stdout.on("data", (chunk: string) => { stdout += chunk; });
        child.stderr.on("data", (chunk: string) => { stderr += chunk; });

        child.on("error", reject);
        child.on("close", (code) => resolve({ exitCode: code ?? -1, stdout, stderr }));
    });

/**
 * ffprobe / ffmpeg command-line tools as the video inspector and renderer.
 */
export class FFmpegToolkit implements VideoInspector, VideoRenderer {
    constructor(
        private readonly run: CommandRunner = spawnCommand,
        private readonly binaries: { ffmpeg: string; ffprobe: string } = { ffmpeg: "ffmpeg", ffprobe: "ffprobe" }
    ) { }

    public async dimensions(videoPath: string): Promise<CanvasSize> {
        const result = await this.run(this.binaries.ffprobe, [
            "-v", "error",
            "-select_streams", "v:0",
            "-show_entries", "stream=width,height",
            "-of", "json",
            videoPath
        ]);

        if (result.exitCode !== 0) {
            Logger.error(`[FFmpeg] ffprobe failed for ${videoPath}`, result.stderr);
            throw new Error(`ffprobe exited with code ${result.exitCode}: ${result.stderr.trim()}`);
        }

        const size = FFmpegToolkit.parseProbeOutput(result.stdout);
        if (!size) {
            throw new Error(`No video stream dimensions found in ${videoPath}`);
        }

        Logger.debug(`[FFmpeg] ${videoPath} is ${size.width}x${size.height}`);
        return size;
    }

    public async render(videoPath: string, subtitlesPath: string, outputPath: string): Promise<void> {
        Logger.info(`[FFmpeg] Burning ${subtitlesPath} into ${videoPath} -> ${outputPath}`);

        const result = await this.run(this.binaries.ffmpeg, [
            "-i", videoPath,
            "-vf", `ass=${FFmpegToolkit.escapeFilterPath(subtitlesPath)}`,
            "-c:a", "copy",
            "-preset", "medium",
            "-movflags", "+faststart",
            "-y",
            outputPath
        ]);

        if (result.exitCode !== 0) {
            Logger.error("[FFmpeg] Subtitle burn-in failed", result.stderr);
            throw new Error(`ffmpeg exited with code ${result.exitCode}: ${lastLines(result.stderr, 5)}`);
        }

        Logger.info("[FFmpeg] Render done.");
    }

    /**
     * Reads `{"streams":[{"width":..,"height":..}]}` as printed by ffprobe.
     */
    public static parseProbeOutput(stdout: string): CanvasSize | null {
        let parsed: unknown;
        try {
            parsed = JSON.parse(stdout);
        } catch {
            return null;
        }

        if (typeof parsed !== "object" || parsed === null || !("streams" in parsed)) return null;
        const { streams } = parsed;
        if (!Array.isArray(streams)) return null;

        for (const stream of streams) {
            if (typeof stream !== "object" || stream === null) continue;
            const width: unknown = stream.width;
            const height: unknown = stream.height;
            if (typeof width === "number" && typeof height === "number" && width > 0 && height > 0) {
                return { width, height };
            }
        }
        return null;
    }

    /**
     * `-vf` text is unescaped twice: once as a filtergraph, where `\ ' [ ] , ;`
     * are special, then as the filter's option string, where `\ ' :` are.
     */
    public static escapeFilterPath(filePath: string): string {
        const optionValue = filePath.replace(/\\/g, "/").replace(/([:'])/g, "\\$1");
        return optionValue.replace(/([\\'[\],;])/g, "\\$1");
    }
}

function lastLines(text: string, count: number): string {
    return text.trim().split("\n").slice(-count).join("\n");
}
