import { Global, Module } from "@nestjs/common";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { DEFAULT_WHEEL_LIMITS, WheelLimits } from "@prize-wheel/core-types";

export interface WheelEngineConfig {
  limits: WheelLimits;
  engineVersion: number;
}

export const WHEEL_ENGINE_CONFIG = Symbol("WHEEL_ENGINE_CONFIG");

export const DEFAULT_ENGINE_VERSION = 1;

type EnvReader = (key: string) => string | undefined;

/**
 * Resolves engine limits from environment-style keys. Missing keys fall back to
 * the defaults; present but malformed keys are rejected at startup.
 */
export function resolveWheelEngineConfig(read: EnvReader): WheelEngineConfig {
  const minEntries = parsePositiveInt(read("WHEEL_MIN_ENTRIES"), "WHEEL_MIN_ENTRIES", DEFAULT_WHEEL_LIMITS.minEntries);
  const maxEntries = parsePositiveInt(read("WHEEL_MAX_ENTRIES"), "WHEEL_MAX_ENTRIES", DEFAULT_WHEEL_LIMITS.maxEntries);
  if (minEntries > maxEntries) {
    throw new Error("WheelConfig: WHEEL_MIN_ENTRIES must not exceed WHEEL_MAX_ENTRIES");
  }

  const defaultClaimWindowMs = parsePositiveInt(
    read("WHEEL_DEFAULT_CLAIM_WINDOW_MS"),
    "WHEEL_DEFAULT_CLAIM_WINDOW_MS",
    DEFAULT_WHEEL_LIMITS.defaultClaimWindowMs,
  );
  const minClaimWindowMs = parsePositiveInt(
    read("WHEEL_MIN_CLAIM_WINDOW_MS"),
    "WHEEL_MIN_CLAIM_WINDOW_MS",
    DEFAULT_WHEEL_LIMITS.minClaimWindowMs,
  );
  if (defaultClaimWindowMs < minClaimWindowMs) {
    throw new Error("WheelConfig: WHEEL_DEFAULT_CLAIM_WINDOW_MS must be at least WHEEL_MIN_CLAIM_WINDOW_MS");
  }

  return {
    limits: { minEntries, maxEntries, defaultClaimWindowMs, minClaimWindowMs },
    engineVersion: parsePositiveInt(read("WHEEL_ENGINE_VERSION"), "WHEEL_ENGINE_VERSION", DEFAULT_ENGINE_VERSION),
  };
}

function parsePositiveInt(input: string | undefined, key: string, fallback: number): number {
  if (input == null || input.trim() === "") {
    return fallback;
  }
  const value = Number(input);
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new Error(`WheelConfig: ${key} must be a positive integer`);
  }
  return value;
}

@Global()
@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true })],
  providers: [
    {
      provide: WHEEL_ENGINE_CONFIG,
      inject: [ConfigService],
      useFactory: (config: ConfigService) => resolveWheelEngineConfig((key) => config.get<string>(key)),
    },
  ],
  exports: [WHEEL_ENGINE_CONFIG],
})
export class WheelConfigModule {}
