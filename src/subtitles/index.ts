export * from './types';
export * from './errors';
export * from './sourceText';
export * from './timeCodec';
export * from './srtParser';
export * from './srtWriter';
export * from './timeShift';
