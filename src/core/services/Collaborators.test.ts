import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { FFmpegToolkit, spawnCommand } from './FFmpegToolkit';
import { writeDocumentAtomic } from './DocumentWriter';
import { VideoCaptioner } from './VideoCaptioner';
import { createCaptionConfig } from '../config/CaptionConfig';
import { MockTranscriptionProvider } from '../providers/MockTranscriptionProvider';
import type { CommandRunner, VideoInspector, VideoRenderer } from '../interfaces/VideoTools';
import { AssemblyError } from '../utils/Errors';

describe('FFmpegToolkit', () => {
    it('should read the dimensions of the first video stream', async () => {
        const run = vi.fn<CommandRunner>().mockResolvedValue({
            exitCode: 0,
            stdout: '{"programs":[],"streams":[{"width":1280,"height":720}]}',
            stderr: ''
        });
        const toolkit = new FFmpegToolkit(run);

        await expect(toolkit.dimensions('in.mp4')).resolves.toEqual({ width: 1280, height: 720 });
        expect(run).toHaveBeenCalledWith('ffprobe', [
            '-v', 'error',
            '-select_streams', 'v:0',
            '-show_entries', 'stream=width,height',
            '-of', 'json',
            'in.mp4'
        ]);
    });

    it('should fail when ffprobe fails or finds no video', async () => {
        const failing = vi.fn<CommandRunner>().mockResolvedValue({ exitCode: 1, stdout: '', stderr: 'in.mp4: No such file or directory\n' });
        const silent = vi.fn<CommandRunner>().mockResolvedValue({ exitCode: 0, stdout: '{"streams":[]}', stderr: '' });

        await expect(new FFmpegToolkit(failing).dimensions('in.mp4'))
            .rejects.toThrow('ffprobe exited with code 1: in.mp4: No such file or directory');
        await expect(new FFmpegToolkit(silent).dimensions('audio.mp3'))
            .rejects.toThrow('No video stream dimensions found in audio.mp3');
    });

    it('should burn subtitles in with the configured binary', async () => {
        const run = vi.fn<CommandRunner>().mockResolvedValue({ exitCode: 0, stdout: '', stderr: '' });
        const toolkit = new FFmpegToolkit(run, { ffmpeg: '/opt/ffmpeg/bin/ffmpeg', ffprobe: 'ffprobe' });

        await toolkit.render('in.mp4', '/tmp/subs:1.ass', 'out.mp4');

        expect(run).toHaveBeenCalledWith('/opt/ffmpeg/bin/ffmpeg', [
            '-i', 'in.mp4',
            '-vf', 'ass=/tmp/subs\\\\:1.ass',
            '-c:a', 'copy',
            '-preset', 'medium',
            '-movflags', '+faststart',
            '-y',
            'out.mp4'
        ]);
    });

    it('should report the tail of the ffmpeg log on failure', async () => {
        const stderr = ['l1', 'l2', 'l3', 'l4', 'l5', 'l6', 'Conversion failed!'].join('\n');
        const run = vi.fn<CommandRunner>().mockResolvedValue({ exitCode: 187, stdout: '', stderr });

        await expect(new FFmpegToolkit(run).render('in.mp4', 'a.ass', 'out.mp4'))
            .rejects.toThrow('ffmpeg exited with code 187: l3\nl4\nl5\nl6\nConversion failed!');
    });

    it('should ignore probe output it cannot read', () => {
        expect(FFmpegToolkit.parseProbeOutput('not json')).toBeNull();
        expect(FFmpegToolkit.parseProbeOutput('{"streams":"none"}')).toBeNull();
        expect(FFmpegToolkit.parseProbeOutput('{"streams":[{"width":0,"height":0},{"width":640,"height":480}]}'))
            .toEqual({ width: 640, height: 480 });
    });

    it('should escape filter paths', () => {
        // Option level first, then filtergraph level
        expect(FFmpegToolkit.escapeFilterPath('C:\\videos\\a.ass')).toBe('C\\\\:/videos/a.ass');
        expect(FFmpegToolkit.escapeFilterPath("/tmp/it's.ass")).toBe("/tmp/it\\\\\\'s.ass");
        expect(FFmpegToolkit.escapeFilterPath('/tmp/[a],b;c.ass')).toBe('/tmp/\\[a\\]\\,b\\;c.ass');
    });

    it('should reject when the program cannot be started', async () => {
        await expect(spawnCommand('caption-styler-missing-binary', [])).rejects.toThrow();
    });
});

describe('writeDocumentAtomic', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'caption-writer-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should replace the target and leave no temporary file', async () => {
        const target = path.join(dir, 'out.ass');
        await writeFile(target, 'old', 'utf-8');

        await writeDocumentAtomic(target, '[Script Info]\n');

        expect(await readFile(target, 'utf-8')).toBe('[Script Info]\n');
        expect(await readdir(dir)).toEqual(['out.ass']);
    });

    it('should raise an assembly error and clean up when the rename fails', async () => {
        const target = path.join(dir, 'taken');
        await mkdir(target);

        const attempt = writeDocumentAtomic(target, 'content');

        await expect(attempt).rejects.toBeInstanceOf(AssemblyError);
        expect(await readdir(dir)).toEqual(['taken']);
    });

    it('should raise an assembly error when the directory is missing', async () => {
        const target = path.join(dir, 'missing', 'out.ass');

        await expect(writeDocumentAtomic(target, 'content')).rejects.toThrow(`Failed to write subtitle document ${target}`);
    });
});

describe('VideoCaptioner', () => {
    let dir: string;
    let inspector: VideoInspector;
    let renderer: VideoRenderer;
    let render: Mock<VideoRenderer['render']>;

    const config = createCaptionConfig({ animation: { enabled: false } });

    beforeEach(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'caption-video-'));
        inspector = { dimensions: vi.fn<VideoInspector['dimensions']>().mockResolvedValue({ width: 1280, height: 720 }) };
        render = vi.fn<VideoRenderer['render']>().mockResolvedValue(undefined);
        renderer = { render };
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should derive output and subtitle paths from the input', () => {
        expect(VideoCaptioner.defaultOutputPath('/videos/clip.mp4')).toBe('/videos/clip_captioned.mp4');
        expect(VideoCaptioner.subtitlesPathFor('/videos/clip_captioned.mp4')).toBe('/videos/clip_captioned.ass');
    });

    it('should write the document beside the output and render it', async () => {
        const captioner = new VideoCaptioner(config, { inspector, renderer });
        const video = path.join(dir, 'clip.mp4');

        const result = await captioner.addCaptions(video, '1\n00:00:01,000 --> 00:00:02,000\nSpeaker 1: Hi\n');

        const expectedOutput = path.join(dir, 'clip_captioned.mp4');
        const expectedSubs = path.join(dir, 'clip_captioned.ass');
        expect(result.videoPath).toBe(expectedOutput);
        expect(result.subtitlesPath).toBe(expectedSubs);
        expect(result.report.document).toContain('PlayResX: 1280\nPlayResY: 720\n');
        expect(await readFile(expectedSubs, 'utf-8')).toBe(result.report.document);
        expect(render).toHaveBeenCalledWith(video, expectedSubs, expectedOutput);
    });

    it('should read subtitles from a file and honor an explicit output', async () => {
        const srtPath = path.join(dir, 'clip.srt');
        await writeFile(srtPath, '1\n00:00:00,000 --> 00:00:01,000\nHello\n', 'utf-8');
        const captioner = new VideoCaptioner(config, { inspector, renderer });

        const result = await captioner.addCaptionsFromFile(path.join(dir, 'clip.mp4'), srtPath, path.join(dir, 'final.mkv'));

        expect(result.subtitlesPath).toBe(path.join(dir, 'final.ass'));
        expect(result.report.eventCount).toBe(1);
    });

    it('should caption from a transcript, one word per cue', async () => {
        const provider = new MockTranscriptionProvider();
        const captioner = new VideoCaptioner(config, { inspector, renderer });

        const result = await captioner.captionFromTranscript(path.join(dir, 'clip.mp4'), path.join(dir, 'clip.wav'), provider);

        expect(provider.lastRequest?.options).toEqual({ maxSpeakers: 3 });
        expect(result.report.document.split('\n').filter(line => line.startsWith('Dialogue:'))).toEqual([
            'Dialogue: 0,0:00:00.00,0:00:00.40,Default,,0,0,0,,{\\c&HFFFFFF&}Hello',
            'Dialogue: 0,0:00:00.40,0:00:01.00,Default,,0,0,0,,{\\c&HFFFFFF&}there!',
            'Dialogue: 0,0:00:01.20,0:00:01.80,Default,,0,0,0,,{\\c&H00FFFF&}Hi!'
        ]);
    });

    it('should not write anything when the video cannot be inspected', async () => {
        const broken: VideoInspector = { dimensions: vi.fn<VideoInspector['dimensions']>().mockRejectedValue(new Error('probe failed')) };
        const captioner = new VideoCaptioner(config, { inspector: broken, renderer });

        await expect(captioner.addCaptions(path.join(dir, 'clip.mp4'), '')).rejects.toThrow('probe failed');
        expect(await readdir(dir)).toEqual([]);
        expect(render).not.toHaveBeenCalled();
    });

    it('should remove the documents it wrote on cleanup', async () => {
        const captioner = new VideoCaptioner(config, { inspector, renderer });
        await captioner.addCaptions(path.join(dir, 'clip.mp4'), '');

        expect(await readdir(dir)).toEqual(['clip_captioned.ass']);
        await captioner.cleanup();
        expect(await readdir(dir)).toEqual([]);
    });
});
