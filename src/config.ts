import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

export interface EngineConfig {
  // Winning confidence below this leaves the field unmatched
  minAcceptConfidence: number;
  // Rule confidence below this sends the field to the AI matcher
  aiFallbackThreshold: number;
  aiTimeoutMs: number;
  kindMismatchPenalty: number;
  anthropicApiKey?: string;
  aiModel: string;
}

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = {
  minAcceptConfidence: 0.5,
  aiFallbackThreshold: 0.7,
  aiTimeoutMs: 8000,
  kindMismatchPenalty: 0.3,
  aiModel: 'claude-3-5-haiku-20241022',
};

const unitInterval = z.number().min(0).max(1);

const engineConfigSchema = z.object({
  minAcceptConfidence: unitInterval,
  aiFallbackThreshold: unitInterval,
  aiTimeoutMs: z.number().int().positive(),
  kindMismatchPenalty: unitInterval,
  anthropicApiKey: z.string().min(1).optional(),
  aiModel: z.string().min(1),
});

export function createEngineConfig(options: Partial<EngineConfig> = {}): EngineConfig {
  return engineConfigSchema.parse({
    minAcceptConfidence: options.minAcceptConfidence ?? DEFAULT_ENGINE_CONFIG.minAcceptConfidence,
    aiFallbackThreshold: options.aiFallbackThreshold ?? DEFAULT_ENGINE_CONFIG.aiFallbackThreshold,
    aiTimeoutMs: options.aiTimeoutMs ?? DEFAULT_ENGINE_CONFIG.aiTimeoutMs,
    kindMismatchPenalty: options.kindMismatchPenalty ?? DEFAULT_ENGINE_CONFIG.kindMismatchPenalty,
    anthropicApiKey: options.anthropicApiKey || undefined,
    aiModel: options.aiModel || DEFAULT_ENGINE_CONFIG.aiModel,
  });
}

function numberFromEnv(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const parsed = Number(raw);
  if (Number.isNaN(parsed)) {
    throw new Error(`Expected a number, got "${raw}"`);
  }
  return parsed;
}

/**
 * Reads engine settings from an environment map. Only the CLI and the match
 * server call this; the engine itself takes the resulting value.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  return createEngineConfig({
    minAcceptConfidence: numberFromEnv(env.MATCH_MIN_CONFIDENCE),
    aiFallbackThreshold: numberFromEnv(env.AI_FALLBACK_THRESHOLD),
    aiTimeoutMs: numberFromEnv(env.AI_TIMEOUT_MS),
    kindMismatchPenalty: numberFromEnv(env.KIND_MISMATCH_PENALTY),
    anthropicApiKey: env.ANTHROPIC_API_KEY,
    aiModel: env.AI_MODEL,
  });
}

export function parsePort(raw: string): number {
  const port = Number(raw);
  if (raw.trim() === '' || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid port "${raw}": expected an integer between 1 and 65535`);
  }
  return port;
}

export interface StoragePaths {
  personalDataPath: string;
  passphrase?: string;
  mappingsDir: string;
}

export function getStoragePaths(env: NodeJS.ProcessEnv = process.env): StoragePaths {
  return {
    personalDataPath: env.PERSONAL_DATA_PATH || 'config/personal-data.json',
    passphrase: env.PERSONAL_DATA_PASSPHRASE || undefined,
    mappingsDir: env.MAPPINGS_DIR || 'config/mappings',
  };
}

// Pacing for injection into web forms
export const HUMAN_CONFIG = {
  // Delay ranges in milliseconds
  minActionDelay: 300,
  maxActionDelay: 900,

  // Typing speed (ms between keystrokes)
  minTypeDelay: 30,
  maxTypeDelay: 90,

  // Pause between two filled fields
  betweenFieldsMin: 400,
  betweenFieldsMax: 1200,
};
