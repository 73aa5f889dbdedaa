import { readFile } from "fs/promises";
import { z } from "zod";
import { isKnownColor } from "../utils/AssColor";
import { ValidationError } from "../utils/Errors";

const colorSchema = z.string().refine(isKnownColor, (value) => ({
    message: `Unknown color "${value}"`
}));

export const StyleConfigSchema = z.object({
    font: z.string().min(1).default("Montserrat"),
    fontSize: z.number().int().positive().default(140),
    color: colorSchema.default("white"),
    outlineColor: colorSchema.default("black"),
    outlineThickness: z.number().nonnegative().default(2),
    /** Vertical position as a fraction of the canvas height, from the top */
    position: z.number().min(0).max(1).default(0.7),
    autoScaleFont: z.boolean().default(false),
    /** Absent keeps the source line breaks; values <= 0 behave as 1 */
    maxWordsPerLine: z.number().int().optional(),
    bold: z.boolean().default(false),
    italic: z.boolean().default(false)
}).strict();

export const AnimationConfigSchema = z.object({
    enabled: z.boolean().default(true),
    type: z.enum(["none", "bounce"]).default("bounce"),
    keyframes: z.number().int().min(2, "keyframes must be at least 2").default(10),
    profile: z.enum(["monotonic", "symmetric"]).default("monotonic")
}).strict();

export const DiarizationConfigSchema = z.object({
    enabled: z.boolean().default(true),
    colors: z.array(colorSchema).nonempty().default(["white", "yellow", "blue"]),
    maxSpeakers: z.number().int().positive().default(3),
    keepSpeakerLabels: z.boolean().default(false)
}).strict();

export const CaptionConfigSchema = z.object({
    style: StyleConfigSchema.default({}),
    animation: AnimationConfigSchema.default({}),
    diarization: DiarizationConfigSchema.default({})
}).strict();

export type StyleConfig = Readonly<z.output<typeof StyleConfigSchema>>;
export type AnimationConfig = Readonly<z.output<typeof AnimationConfigSchema>>;
export type DiarizationConfig = Readonly<z.output<typeof DiarizationConfigSchema>>;
export type AnimationKind = AnimationConfig["type"];
export type BounceProfile = AnimationConfig["profile"];

export interface CaptionConfig {
    readonly style: StyleConfig;
    readonly animation: AnimationConfig;
    readonly diarization: DiarizationConfig;
}

export type StyleConfigInput = z.input<typeof StyleConfigSchema>;
export type AnimationConfigInput = z.input<typeof AnimationConfigSchema>;
export type DiarizationConfigInput = z.input<typeof DiarizationConfigSchema>;
export type CaptionConfigInput = z.input<typeof CaptionConfigSchema>;

function build<S extends z.ZodTypeAny>(schema: S, input: unknown, label: string): z.output<S> {
    const result = schema.safeParse(input ?? {});
    if (!result.success) {
        const issues = result.error.issues.map(issue =>
            issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
        );
        throw new ValidationError(`Invalid ${label}: ${issues.join("; ")}`, { issues });
    }
    return result.data;
}

function freeze<T extends object>(value: T): Readonly<T> {
    for (const nested of Object.values(value)) {
        if (typeof nested === "object" && nested !== null) {
            Object.freeze(nested);
        }
    }
    return Object.freeze(value);
}

export function createStyleConfig(input: StyleConfigInput = {}): StyleConfig {
    return freeze(build(StyleConfigSchema, input, "style config"));
}

export function createAnimationConfig(input: AnimationConfigInput = {}): AnimationConfig {
    return freeze(build(AnimationConfigSchema, input, "animation config"));
}

export function createDiarizationConfig(input: DiarizationConfigInput = {}): DiarizationConfig {
    return freeze(build(DiarizationConfigSchema, input, "diarization config"));
}

/**
 * Builds a complete configuration, filling every omitted value with its default.
 * @throws ValidationError listing each offending field.
 */
export function createCaptionConfig(input: CaptionConfigInput = {}): CaptionConfig {
    return captionConfigFrom(input);
}

function captionConfigFrom(input: unknown): CaptionConfig {
    const parsed = build(CaptionConfigSchema, input, "caption config");
    return Object.freeze({
        style: freeze(parsed.style),
        animation: freeze(parsed.animation),
        diarization: freeze(parsed.diarization)
    });
}

/**
 * Reads a JSON configuration file.
 */
export async function loadCaptionConfig(filePath: string): Promise<CaptionConfig> {
    const raw = await readFile(filePath, "utf-8");

    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (e) {
        const detail = e instanceof Error ? e.message : String(e);
        throw new ValidationError(`Config file ${filePath} is not valid JSON: ${detail}`);
    }

    return captionConfigFrom(json);
}
