import type { FontCatalog } from "../interfaces/FontCatalog";

/** Display name to font file for the fonts shipped alongside the renderer. */
const BUNDLED_FONTS: Record<string, string> = {
    "CheGuevara Barry": "CheGuevaraBarry-Brown.ttf",
    "Fira Sans Condensed": "FiraSansCondensed-ExtraBoldItalic.ttf",
    "Gabarito": "Gabarito-Black.ttf",
    "Komika Axis": "KOMIKAX_.ttf",
    "Montserrat": "Montserrat-Bold.ttf",
    "Proxima Nova": "Proxima-Nova-Semibold.ttf",
    "Rubik": "Rubik-ExtraBold.ttf"
};

/**
 * Font catalog backed by a fixed name table.
 * Extra fonts can be registered, e.g. ones installed on the rendering host.
 */
export class BundledFontCatalog implements FontCatalog {
    private fonts: Map<string, string>;

    constructor(extra: Record<string, string> = {}) {
        this.fonts = new Map(Object.entries({ ...BUNDLED_FONTS, ...extra }));
    }

    public register(displayName: string, resource: string) {
        this.fonts.set(displayName, resource);
    }

    public has(displayName: string): boolean {
        return this.fonts.has(displayName);
    }

    public resolve(displayName: string): string | null {
        return this.fonts.get(displayName) ?? null;
    }

    public list(): string[] {
        return [...this.fonts.keys()].sort();
    }
}
