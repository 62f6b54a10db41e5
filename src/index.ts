export * from './subtitles';
export { shiftSrt } from './pipelines/shiftPipeline';
export type { ShiftResult } from './pipelines/shiftPipeline';
export { locateOffset, renderDiagnostic } from './diagnostics/render';
export type { RenderOptions, SourceLocation } from './diagnostics/render';
