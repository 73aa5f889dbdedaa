import { describe, it, expect } from 'vitest';
import { CaptionCompiler } from './CaptionCompiler';
import { BundledFontCatalog } from './BundledFontCatalog';
import { createCaptionConfig } from '../config/CaptionConfig';
import { ValidationError } from '../utils/Errors';

function lastEvent(document: string): string {
    const lines = document.trimEnd().split('\n');
    return lines[lines.length - 1];
}

function events(document: string): string[] {
    return document.split('\n').filter(line => line.startsWith('Dialogue:'));
}

describe('CaptionCompiler', () => {
    const still = createCaptionConfig({ animation: { enabled: false } });

    it('should color the first speaker with the first palette color', () => {
        const compiler = new CaptionCompiler(still);
        const report = compiler.compile('1\n00:00:01,000 --> 00:00:04,000\nSpeaker 1: Hello, world!\n');

        expect(report.eventCount).toBe(1);
        expect(report.skipped).toEqual([]);
        expect(lastEvent(report.document)).toBe('Dialogue: 0,0:00:01.00,0:00:04.00,Default,,0,0,0,,{\\c&HFFFFFF&}Hello, world!');
        expect(report.document.startsWith('[Script Info]\nScriptType: v4.00+\nPlayResX: 1080\nPlayResY: 1920\n')).toBe(true);
    });

    it('should keep cue order and report the cues it skipped', () => {
        const srt = `1
00:00:00,000 --> 00:00:01,000
Speaker 1: Hi

2
00:00:xx,000 --> 00:00:03,000
Broken

3
00:00:05,000 --> 00:00:04,000
Backwards

4
00:00:06,000 --> 00:00:07,000
Speaker 2: Bye
`;
        const report = new CaptionCompiler(still).compile(srt);

        expect(report.eventCount).toBe(2);
        expect(events(report.document)).toEqual([
            'Dialogue: 0,0:00:00.00,0:00:01.00,Default,,0,0,0,,{\\c&HFFFFFF&}Hi',
            'Dialogue: 0,0:00:06.00,0:00:07.00,Default,,0,0,0,,{\\c&H00FFFF&}Bye'
        ]);
        expect(report.skipped).toEqual([
            { stage: 'parse', index: 2, reason: 'Block 2: cue 2 has a malformed timestamp "00:00:xx,000 --> 00:00:03,000"' },
            { stage: 'style', index: 3, reason: 'Cue duration must be positive, got -1000ms' }
        ]);
        expect([...report.speakerColors]).toEqual([
            ['Speaker 1', 'white'],
            ['Speaker 2', 'yellow']
        ]);
    });

    it('should produce identical documents for identical input', () => {
        const srt = '1\n00:00:00,000 --> 00:00:02,000\nAnn: one\n\n2\n00:00:02,000 --> 00:00:03,500\nBob: two\n';
        const compiler = new CaptionCompiler(createCaptionConfig());

        const first = compiler.compile(srt);
        const second = compiler.compile(srt);

        expect(second.document).toBe(first.document);
        expect([...second.speakerColors]).toEqual([...first.speakerColors]);
    });

    it('should cycle the palette across speakers', () => {
        const config = createCaptionConfig({
            animation: { enabled: false },
            diarization: { colors: ['red', 'green'], maxSpeakers: 5 }
        });
        const srt = ['A', 'B', 'C', 'A'].map((speaker, i) =>
            `${i + 1}\n00:00:0${i},000 --> 00:00:0${i},900\n${speaker}: line ${i + 1}\n`
        ).join('\n');

        const report = new CaptionCompiler(config).compile(srt);

        expect(events(report.document).map(line => line.split(',,').pop())).toEqual([
            '{\\c&H0000FF&}line 1',
            '{\\c&H00FF00&}line 2',
            '{\\c&H0000FF&}line 3',
            '{\\c&H0000FF&}line 4'
        ]);
    });

    it('should leave speakers uncolored when diarization is off', () => {
        const config = createCaptionConfig({ animation: { enabled: false }, diarization: { enabled: false } });
        const report = new CaptionCompiler(config).compile('1\n00:00:01,000 --> 00:00:02,000\nSpeaker 1: Hello\n');

        expect(lastEvent(report.document)).toBe('Dialogue: 0,0:00:01.00,0:00:02.00,Default,,0,0,0,,Hello');
        expect(report.speakerColors.size).toBe(0);
    });

    it('should drop a markup color that only looks like an object property', () => {
        const report = new CaptionCompiler(still).compile('1\n00:00:01,000 --> 00:00:02,000\n<font color="constructor">Hi</font>\n');

        expect(lastEvent(report.document)).toBe('Dialogue: 0,0:00:01.00,0:00:02.00,Default,,0,0,0,,Hi');
    });

    it('should use the given canvas size', () => {
        const report = new CaptionCompiler(still).compile('1\n00:00:01,000 --> 00:00:02,000\nHi\n', { width: 1280, height: 720 });

        expect(report.document).toContain('PlayResX: 1280\nPlayResY: 720\n');
        expect(report.document).toContain(',10,10,503,1\n');
    });

    it('should write an empty events section for empty input', () => {
        const report = new CaptionCompiler(still).compile('');

        expect(report.eventCount).toBe(0);
        expect(report.document.endsWith('[Events]\nFormat: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text\n')).toBe(true);
    });

    it('should refuse a font that is not in the catalog', () => {
        const config = createCaptionConfig({ style: { font: 'Papyrus' } });

        expect(() => new CaptionCompiler(config).compile('')).toThrow(ValidationError);
        expect(() => new CaptionCompiler(config).compile('')).toThrow('Font not available: Papyrus');
    });

    it('should accept fonts registered in a custom catalog', () => {
        const config = createCaptionConfig({ style: { font: 'Papyrus' }, animation: { enabled: false } });
        const fonts = new BundledFontCatalog({ Papyrus: 'papyrus.ttf' });

        const report = new CaptionCompiler(config, { fonts }).compile('');
        expect(report.document).toContain('Style: Default,Papyrus,140,');
    });

    it('should animate with a replacement curve', () => {
        const config = createCaptionConfig({ animation: { keyframes: 2 } });
        const compiler = new CaptionCompiler(config, { curve: () => 90 });

        const report = compiler.compile('1\n00:00:00,000 --> 00:00:01,000\nHi\n');
        expect(lastEvent(report.document)).toBe(
            'Dialogue: 0,0:00:00.00,0:00:01.00,Default,,0,0,0,,{\\t(0,0,\\fscx90\\fscy90)}{\\t(0,1000,\\fscx90\\fscy90)}Hi'
        );
    });

    it('should expose its config', () => {
        expect(new CaptionCompiler(still).getConfig()).toBe(still);
    });
});

describe('BundledFontCatalog', () => {
    it('should list the bundled fonts in order', () => {
        expect(new BundledFontCatalog().list()).toEqual([
            'CheGuevara Barry',
            'Fira Sans Condensed',
            'Gabarito',
            'Komika Axis',
            'Montserrat',
            'Proxima Nova',
            'Rubik'
        ]);
    });

    it('should resolve fonts to their files', () => {
        const catalog = new BundledFontCatalog();

        expect(catalog.resolve('Montserrat')).toBe('Montserrat-Bold.ttf');
        expect(catalog.resolve('Arial')).toBeNull();
        expect(catalog.has('montserrat')).toBe(false);
    });

    it('should register extra fonts', () => {
        const catalog = new BundledFontCatalog();
        catalog.register('Inter', '/usr/share/fonts/Inter.ttf');

        expect(catalog.has('Inter')).toBe(true);
        expect(catalog.resolve('Inter')).toBe('/usr/share/fonts/Inter.ttf');
    });
});
