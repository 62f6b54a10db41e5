import dotenv from 'dotenv';
import path from 'path';

// Load environment variables
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

export type ColorMode = 'auto' | 'always' | 'never';

export interface Config {
  nodeEnv: string;

  // Output
  color: ColorMode;
  verbose: boolean;

  // File handling
  encoding: BufferEncoding;
}

const COLOR_MODES: readonly ColorMode[] = ['auto', 'always', 'never'];

function getEnvString(key: string, defaultValue: string = ''): string {
  return process.env[key] ?? defaultValue;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}

function getEnvColorMode(key: string, defaultValue: ColorMode): ColorMode {
  // https://no-color.org
  if (process.env.NO_COLOR) return 'never';
  const value = getEnvString(key, defaultValue).trim().toLowerCase();
  return COLOR_MODES.find((mode) => mode === value) ?? defaultValue;
}

function getEnvEncoding(key: string, defaultValue: BufferEncoding): BufferEncoding {
  const value = getEnvString(key, defaultValue).trim();
  return Buffer.isEncoding(value) ? value : defaultValue;
}

export function loadConfig(): Config {
  return {
    nodeEnv: getEnvString('NODE_ENV', 'development'),

    // Output
    color: getEnvColorMode('SRT_SHIFT_COLOR', 'auto'),
    verbose: getEnvBoolean('SRT_SHIFT_VERBOSE', false),

    // File handling
    encoding: getEnvEncoding('SRT_SHIFT_ENCODING', 'utf-8'),
  };
}

/**
 * Decides whether diagnostics written to the given stream should be coloured
 */
export function useColor(mode: ColorMode, stream: { isTTY?: boolean }): boolean {
  if (mode === 'auto') return stream.isTTY === true;
  return mode === 'always';
}

export const config = loadConfig();
