export interface CanvasSize {
    width: number;
    height: number;
}

/**
 * Reads the frame size of a video.
 */
export interface VideoInspector {
    /**
     * @throws if the file cannot be read.
     */
    dimensions(videoPath: string): Promise<CanvasSize>;
}

/**
 * Burns a subtitle document into a video.
 */
export interface VideoRenderer {
    render(videoPath: string, subtitlesPath: string, outputPath: string): Promise<void>;
}

export interface CommandResult {
    exitCode: number;
    stdout: string;
    stderr: string;
}

/**
 * Runs an external program to completion.
 */
export type CommandRunner = (command: string, args: readonly string[]) => Promise<CommandResult>;
