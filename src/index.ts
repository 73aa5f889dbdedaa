export {
    createCaptionConfig,
    createStyleConfig,
    createAnimationConfig,
    createDiarizationConfig,
    loadCaptionConfig
} from "./core/config/CaptionConfig";
export type {
    CaptionConfig,
    CaptionConfigInput,
    StyleConfig,
    AnimationConfig,
    DiarizationConfig,
    AnimationKind,
    BounceProfile
} from "./core/config/CaptionConfig";

export type { Cue, ProcessedCue, StyledEvent, CueOutcome, CueList } from "./core/models/Cue";
export type { CueParser } from "./core/interfaces/CueParser";
export type { FontCatalog } from "./core/interfaces/FontCatalog";
export type { ScaleCurve, AnimationKeyframe } from "./core/interfaces/ScaleCurve";
export type { CanvasSize, VideoInspector, VideoRenderer, CommandRunner, CommandResult } from "./core/interfaces/VideoTools";
export type { TranscriptionProvider, Utterance, TranscribedWord, TranscriptionOptions } from "./core/interfaces/TranscriptionProvider";

export { SrtParser } from "./core/parsers/SrtParser";
export { tokenizeMarkup, stripMarkup } from "./core/parsers/MarkupTokenizer";
export type { MarkupToken } from "./core/parsers/MarkupTokenizer";

export { TextProcessor } from "./core/services/TextProcessor";
export { SpeakerColorAssigner } from "./core/services/SpeakerColorAssigner";
export { AnimationEngine, monotonicBounce, symmetricBounce, BOUNCE_CURVES } from "./core/services/AnimationEngine";
export { StyleCompiler, DEFAULT_STYLE_NAME } from "./core/services/StyleCompiler";
export { DocumentAssembler, DEFAULT_CANVAS } from "./core/services/DocumentAssembler";
export { CaptionCompiler } from "./core/services/CaptionCompiler";
export type { CompilationReport, SkippedCue, CaptionCompilerOptions } from "./core/services/CaptionCompiler";
export { BundledFontCatalog } from "./core/services/BundledFontCatalog";
export { FFmpegToolkit, spawnCommand } from "./core/services/FFmpegToolkit";
export { writeDocumentAtomic } from "./core/services/DocumentWriter";
export { VideoCaptioner } from "./core/services/VideoCaptioner";
export type { CaptionedVideo, VideoCaptionerOptions } from "./core/services/VideoCaptioner";
export { cuesToSrt, utterancesToSrt, applySpeakerColors } from "./core/services/TranscriptSerializer";
export type { CueGranularity } from "./core/services/TranscriptSerializer";
export { MockTranscriptionProvider } from "./core/providers/MockTranscriptionProvider";

export { CaptionError, ParseError, ValidationError, AssemblyError } from "./core/utils/Errors";
export { toAssColor } from "./core/utils/AssColor";
export { parseSrtTimestamp, formatSrtTimestamp, formatAssTimestamp } from "./core/utils/Timecode";
export { Logger } from "./core/utils/Logger";
export type { LogEntry, LogLevel } from "./core/utils/Logger";
