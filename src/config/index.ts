/**
 * Configuration
 * Environment variables with CLI flag overrides, resolved once at startup.
 */

import type { FastPathMode } from '../core/orchestrator.js';
import { DEFAULT_FAST_PATH_OPTIONS, type FastPathOptions } from '../core/fast-path.js';
import { logger, isLogLevelName, type LogLevelName } from '../shared/logger.js';
import { defaultDataDir } from '../shared/paths.js';
import { DEFAULT_RECORD_COMMAND } from '../speech/capture.js';
import { defaultTtsCommand } from '../speech/speaker.js';
import { DEFAULT_COOLDOWN_MS } from '../triggers/state-machine.js';

export type EntryPoint = 'gesture' | 'headless' | 'panel';

export type Flags = Record<string, string | boolean>;

export interface AssistantConfig {
  readonly anthropicApiKey?: string;
  readonly openaiApiKey?: string;
  readonly model: string;
  readonly sttModel: string;
  readonly ttsCommand: readonly string[];
  readonly ttsVoice?: string;
  readonly recordCommand: readonly string[];
  readonly landmarkCommand?: string;
  readonly cooldownMs: number;
  readonly wakeWords: readonly string[];
  readonly wakeWindowMs: number;
  /** Unset means the entry point's default */
  readonly fastPathMode?: FastPathMode;
  readonly fastPath: FastPathOptions;
  /** Unset means the entry point's default */
  readonly imageRetentionLimit?: number;
  readonly display: { readonly width: number; readonly height: number };
  readonly dataDir: string;
  readonly port: number;
  readonly logLevel: LogLevelName;
}

export const DEFAULT_MODEL = 'claude-sonnet-4-20250514';
export const DEFAULT_STT_MODEL = 'whisper-1';
export const DEFAULT_PORT = 3000;

export const SYSTEM_PROMPT_SUFFIXES: Record<EntryPoint, string> = {
  gesture: 'User is using a gesture-controlled voice assistant. Be EXTREMELY concise. Max 1 sentence.',
  headless: '',
  panel:
    'User is using a floating overlay. Be EXTREMELY concise. Do not narrate obvious steps. Only speak when necessary or to confirm completion. Max 1 sentence.',
};

export const DEFAULT_IMAGE_RETENTION: Record<EntryPoint, number> = {
  gesture: 3,
  headless: 10,
  panel: 3,
};

export const DEFAULT_FAST_PATH_MODES: Record<EntryPoint, FastPathMode> = {
  gesture: 'short-circuit',
  headless: 'annotate',
  panel: 'annotate',
};

type Env = Record<string, string | undefined>;

function nonEmpty(value: string | boolean | undefined): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

function list(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const items = value.split(',').map(item => item.trim()).filter(Boolean);
  return items.length > 0 ? items : undefined;
}

function argv(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const parts = value.split(/\s+/).filter(Boolean);
  return parts.length > 0 ? parts : undefined;
}

/** Positive integer, or the fallback with a warning. */
function integer(name: string, raw: string | undefined, fallback: number, min = 1): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    logger.warn('Config', `Invalid ${name}: "${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

function optionalInteger(name: string, raw: string | undefined, min: number): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    logger.warn('Config', `Invalid ${name}: "${raw}", using the entry point default`);
    return undefined;
  }
  return value;
}

function fastPathMode(raw: string | undefined): FastPathMode | undefined {
  if (raw === undefined) return undefined;
  if (raw === 'short-circuit' || raw === 'annotate') return raw;
  logger.warn('Config', `Invalid fast-path mode: "${raw}", using the entry point default`);
  return undefined;
}

function logLevel(raw: string | undefined): LogLevelName {
  if (raw === undefined) return 'INFO';
  const upper = raw.toUpperCase();
  if (isLogLevelName(upper)) return upper;
  logger.warn('Config', `Invalid log level: "${raw}", using INFO`);
  return 'INFO';
}

/**
 * Flags win over environment variables. Invalid values fall back to their
 * defaults; nothing here throws.
 */
export function loadConfig(env: Env = process.env, flags: Flags = {}): AssistantConfig {
  const read = (flag: string | null, name: string): string | undefined =>
    (flag ? nonEmpty(flags[flag]) : undefined) ?? nonEmpty(env[name]);

  const config: AssistantConfig = {
    anthropicApiKey: nonEmpty(env.ANTHROPIC_API_KEY),
    openaiApiKey: nonEmpty(env.OPENAI_API_KEY),
    model: read('model', 'PALMTALK_MODEL') ?? DEFAULT_MODEL,
    sttModel: read(null, 'PALMTALK_STT_MODEL') ?? DEFAULT_STT_MODEL,
    ttsCommand: argv(read(null, 'PALMTALK_TTS_COMMAND')) ?? defaultTtsCommand(),
    ttsVoice: read('voice', 'PALMTALK_TTS_VOICE'),
    recordCommand: argv(read(null, 'PALMTALK_RECORD_COMMAND')) ?? DEFAULT_RECORD_COMMAND,
    landmarkCommand: read('landmarks', 'PALMTALK_LANDMARK_COMMAND'),
    cooldownMs: integer('cooldown', read('cooldown', 'PALMTALK_GESTURE_COOLDOWN_MS'), DEFAULT_COOLDOWN_MS, 0),
    wakeWords: list(read('wake-word', 'PALMTALK_WAKE_WORDS')) ?? ['assistant'],
    wakeWindowMs: integer('wake window', read(null, 'PALMTALK_WAKE_WINDOW_MS'), 5000),
    fastPathMode: fastPathMode(read('fast-path', 'PALMTALK_FASTPATH_MODE')),
    fastPath: {
      maxAppTokens: integer(
        'fast-path token cap',
        read(null, 'PALMTALK_FASTPATH_MAX_TOKENS'),
        DEFAULT_FAST_PATH_OPTIONS.maxAppTokens,
      ),
      conjunctions: list(read(null, 'PALMTALK_FASTPATH_CONJUNCTIONS'))?.map(word => word.toLowerCase())
        ?? DEFAULT_FAST_PATH_OPTIONS.conjunctions,
    },
    imageRetentionLimit: optionalInteger('image retention', read(null, 'PALMTALK_IMAGE_RETENTION'), 0),
    display: {
      width: integer('display width', read(null, 'PALMTALK_DISPLAY_WIDTH'), 1440),
      height: integer('display height', read(null, 'PALMTALK_DISPLAY_HEIGHT'), 900),
    },
    dataDir: read(null, 'PALMTALK_DATA_DIR') ?? defaultDataDir(),
    port: integer('port', read('port', 'PORT'), DEFAULT_PORT),
    logLevel: logLevel(read('log-level', 'LOG_LEVEL')),
  };

  return Object.freeze(config);
}

export function resolveFastPathMode(config: AssistantConfig, entry: EntryPoint): FastPathMode {
  return config.fastPathMode ?? DEFAULT_FAST_PATH_MODES[entry];
}

export function resolveImageRetention(config: AssistantConfig, entry: EntryPoint): number {
  return config.imageRetentionLimit ?? DEFAULT_IMAGE_RETENTION[entry];
}
