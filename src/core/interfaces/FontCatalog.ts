/**
 * Resolves font display names to font resources.
 */
export interface FontCatalog {
    has(displayName: string): boolean;

    /**
     * @returns The font resource (e.g. a file name), or null if unknown.
     */
    resolve(displayName: string): string | null;

    list(): string[];
}
