const SRT_TIMESTAMP_REGEX = /^(\d{2,}):(\d{2}):(\d{2}),(\d{3})$/;

/**
 * Parses an SRT timestamp `HH:MM:SS,mmm` into milliseconds.
 * @returns null when the text is not a valid timestamp.
 */
export function parseSrtTimestamp(text: string): number | null {
    const match = SRT_TIMESTAMP_REGEX.exec(text.trim());
    if (!match) return null;

    const hours = parseInt(match[1], 10);
    const minutes = parseInt(match[2], 10);
    const seconds = parseInt(match[3], 10);
    const millis = parseInt(match[4], 10);

    if (minutes > 59 || seconds > 59) return null;

    return ((hours * 60 + minutes) * 60 + seconds) * 1000 + millis;
}

/** Formats milliseconds as `HH:MM:SS,mmm`. */
export function formatSrtTimestamp(ms: number): string {
    const total = Math.max(0, Math.round(ms));
    const hours = Math.floor(total / 3_600_000);
    const minutes = Math.floor((total % 3_600_000) / 60_000);
    const seconds = Math.floor((total % 60_000) / 1000);
    const millis = total % 1000;

    return `${pad(hours, 2)}:${pad(minutes, 2)}:${pad(seconds, 2)},${pad(millis, 3)}`;
}

/**
 * Formats milliseconds as an ASS timestamp `H:MM:SS.cc`.
 * Centiseconds are truncated, not rounded.
 */
export function formatAssTimestamp(ms: number): string {
    const total = Math.max(0, Math.floor(ms));
    const hours = Math.floor(total / 3_600_000);
    const minutes = Math.floor((total % 3_600_000) / 60_000);
    const seconds = Math.floor((total % 60_000) / 1000);
    const centis = Math.floor((total % 1000) / 10);

    return `${hours}:${pad(minutes, 2)}:${pad(seconds, 2)}.${pad(centis, 2)}`;
}

function pad(value: number, width: number): string {
    return String(value).padStart(width, '0');
}
