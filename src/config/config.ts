import fs from "node:fs";
import JSON5 from "json5";
import type { ErrorCorrectionLevel } from "../qr/provider.js";
import type { RenderRequest } from "../render/pipeline.js";
import { extractErrorCode, formatErrorMessage } from "../infra/errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import {
  DEFAULT_BACK_COLOR,
  DEFAULT_BORDER,
  DEFAULT_ERROR_CORRECTION,
  DEFAULT_EYE_COLOR,
  DEFAULT_FILL_COLOR,
  DEFAULT_LOGO_ASPECT,
  DEFAULT_LOGO_PADDING,
  DEFAULT_LOGO_PATH,
  DEFAULT_MODULE_RADIUS_RATIO,
  DEFAULT_OUTPUT_PATH,
  DEFAULT_QR_VERSION,
  DEFAULT_SUPERSAMPLE,
  DEFAULT_TARGET_SIZE,
} from "./defaults.js";
import { resolveConfigPath } from "./paths.js";
import { QrStylerConfigSchema, type QrStylerConfig } from "./schema.js";

const log = createSubsystemLogger("config");

export class ConfigError extends Error {
  readonly configPath: string;

  constructor(configPath: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
    this.configPath = configPath;
  }
}

export type LoadedConfig = {
  path?: string;
  exists: boolean;
  config: QrStylerConfig;
};

/** Reads and validates the JSON5 config. A missing file yields an empty config. */
export function loadConfig(
  opts: { configPath?: string; env?: NodeJS.ProcessEnv } = {},
): LoadedConfig {
  const configPath = resolveConfigPath(opts.configPath, opts.env ?? process.env);
  if (!configPath) {
    return { exists: false, config: {} };
  }

  let raw: string;
  try {
    raw = fs.readFileSync(configPath, "utf-8");
  } catch (err) {
    if (extractErrorCode(err) === "ENOENT") {
      log.debug("no config file", { configPath });
      return { path: configPath, exists: false, config: {} };
    }
    throw new ConfigError(
      configPath,
      `Failed to read config at ${configPath}: ${formatErrorMessage(err)}`,
      { cause: err },
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON5.parse(raw);
  } catch (err) {
    throw new ConfigError(
      configPath,
      `Failed to parse config at ${configPath}: ${formatErrorMessage(err)}`,
      { cause: err },
    );
  }

  const result = QrStylerConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `- ${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("\n");
    throw new ConfigError(configPath, `Invalid config at ${configPath}:\n${issues}`);
  }
  log.debug("loaded config", { configPath });
  return { path: configPath, exists: true, config: result.data };
}

export type RenderOverrides = {
  size?: number;
  fillColor?: string;
  eyeColor?: string;
  backColor?: string;
  /** `null` renders without a logo. */
  logo?: string | null;
  output?: string;
  version?: number;
  errorCorrection?: ErrorCorrectionLevel;
  border?: number;
  supersample?: number;
  moduleRadiusRatio?: number;
};

/** Flag > config file > built-in default. */
export function resolveRenderRequest(
  payload: string,
  config: QrStylerConfig,
  overrides: RenderOverrides = {},
): RenderRequest & { outputPath: string } {
  const render = config.render ?? {};
  const defaults = config.defaults ?? {};
  const logo = overrides.logo !== undefined ? overrides.logo : defaults.logo;
  return {
    payload,
    targetSize: overrides.size ?? defaults.size ?? DEFAULT_TARGET_SIZE,
    fillColor: overrides.fillColor ?? defaults.fillColor ?? DEFAULT_FILL_COLOR,
    eyeColor: overrides.eyeColor ?? defaults.eyeColor ?? DEFAULT_EYE_COLOR,
    backColor: overrides.backColor ?? render.backColor ?? DEFAULT_BACK_COLOR,
    logoPath: logo === undefined ? DEFAULT_LOGO_PATH : logo,
    outputPath: overrides.output ?? defaults.output ?? DEFAULT_OUTPUT_PATH,
    version: overrides.version ?? render.version ?? DEFAULT_QR_VERSION,
    errorCorrection: overrides.errorCorrection ?? render.errorCorrection ?? DEFAULT_ERROR_CORRECTION,
    borderSize: overrides.border ?? render.border ?? DEFAULT_BORDER,
    supersample: overrides.supersample ?? render.supersample ?? DEFAULT_SUPERSAMPLE,
    moduleRadiusRatio:
      overrides.moduleRadiusRatio ?? render.moduleRadiusRatio ?? DEFAULT_MODULE_RADIUS_RATIO,
    logoAspect: render.logoAspect ?? DEFAULT_LOGO_ASPECT,
    logoPadding: render.logoPadding ?? DEFAULT_LOGO_PADDING,
  };
}
