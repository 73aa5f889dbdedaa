/**
 * Base class for every error raised by the caption pipeline.
 */
export class CaptionError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * A cue block of the source subtitle text could not be read.
 * Recovered locally: the parser records it and moves on to the next block.
 */
export class ParseError extends CaptionError {
    /** 1-based position of the block in the source text */
    public readonly block: number;

    constructor(block: number, message: string) {
        super(`Block ${block}: ${message}`);
        this.block = block;
    }
}

/**
 * Configuration or cue content that cannot be styled.
 */
export class ValidationError extends CaptionError {
    /** Index of the offending cue, when the error concerns a single cue */
    public readonly cueIndex?: number;

    /** Field-level problems, e.g. from schema validation */
    public readonly issues: readonly string[];

    constructor(message: string, details?: { cueIndex?: number; issues?: readonly string[] }) {
        super(message);
        this.cueIndex = details?.cueIndex;
        this.issues = details?.issues ?? [];
    }
}

/**
 * The finished document could not be written.
 */
export class AssemblyError extends CaptionError {
    public readonly path: string;

    constructor(path: string, cause: unknown) {
        const detail = cause instanceof Error ? cause.message : String(cause);
        super(`Failed to write subtitle document ${path}: ${detail}`, { cause });
        this.path = path;
    }
}
