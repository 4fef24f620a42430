/**
 * Configuration Module
 *
 * Resolves panel stack settings from defaults, the environment, and
 * explicit overrides (highest precedence last). Values are validated
 * once here so the controller can trust them.
 *
 * Usage:
 * ```typescript
 * const config = resolvePanelStackConfig({ clock: () => frameTimeMs });
 * ```
 */

import { ValidationError } from "./errors";
import { assertFunction, assertNonNegativeNumber } from "./validation";

export interface PanelStackConfig {
  /** Taps closer together than this count as a double tap */
  doubleTapWindowMs: number;

  /** Millisecond clock used to time taps */
  clock: () => number;
}

export const DEFAULT_PANEL_STACK_CONFIG: Readonly<PanelStackConfig> = {
  doubleTapWindowMs: 500,
  clock: () => performance.now(),
};

/** Environment variable overriding the double-tap window */
export const DOUBLE_TAP_ENV = "PANELKIT_DOUBLE_TAP_MS";

type Env = Record<string, string | undefined>;

function readEnv(env: Env): Partial<PanelStackConfig> {
  const raw = env[DOUBLE_TAP_ENV];
  if (raw === undefined || raw.trim() === "") return {};

  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ValidationError(`expected a number, got "${raw}"`, DOUBLE_TAP_ENV, raw);
  }
  return { doubleTapWindowMs: value };
}

export function resolvePanelStackConfig(
  overrides: Partial<PanelStackConfig> = {},
  env: Env = typeof process !== "undefined" ? process.env : {},
): PanelStackConfig {
  const config: PanelStackConfig = {
    ...DEFAULT_PANEL_STACK_CONFIG,
    ...readEnv(env),
    ...overrides,
  };

  assertNonNegativeNumber(config.doubleTapWindowMs, "doubleTapWindowMs");
  assertFunction(config.clock, "clock");
  return config;
}
