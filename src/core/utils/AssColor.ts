/**
 * ASS colors are written `&HBBGGRR&` (blue, green, red).
 */
const NAMED_COLORS: ReadonlyMap<string, string> = new Map(Object.entries({
    white: "&HFFFFFF&",
    black: "&H000000&",
    yellow: "&H00FFFF&",
    red: "&H0000FF&",
    blue: "&HFF0000&",
    green: "&H00FF00&",
    purple: "&H800080&",
    orange: "&H00A5FF&",
    cyan: "&HFFFF00&",
    magenta: "&HFF00FF&"
}));

const HEX_REGEX = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i;
const ASS_REGEX = /^&H([0-9a-f]{6}|[0-9a-f]{8})&?$/i;

/**
 * Converts a color name, `#RRGGBB` or a literal ASS code to an ASS color code.
 * @returns null for anything unrecognised.
 */
export function toAssColor(color: string): string | null {
    const value = color.trim();

    const named = NAMED_COLORS.get(value.toLowerCase());
    if (named) return named;

    const hex = HEX_REGEX.exec(value);
    if (hex) {
        const [, r, g, b] = hex;
        return `&H${b}${g}${r}&`.toUpperCase();
    }

    const ass = ASS_REGEX.exec(value);
    if (ass) return `&H${ass[1].toUpperCase()}&`;

    return null;
}

export function isKnownColor(color: string): boolean {
    return toAssColor(color) !== null;
}

/**
 * Two color spellings are the same color when they map to the same ASS code.
 */
export function sameColor(a: string, b: string): boolean {
    const left = toAssColor(a);
    return left !== null && left === toAssColor(b);
}

export function namedColors(): string[] {
    return [...NAMED_COLORS.keys()];
}
