import type { ErrorCorrectionLevel } from "../qr/provider.js";
import type { RuntimeEnv } from "../runtime.js";
import { parseTargetSize } from "../cli/parse-size.js";
import {
  ConfigError,
  loadConfig,
  resolveRenderRequest,
  type LoadedConfig,
  type RenderOverrides,
} from "../config/config.js";
import { DEFAULT_TARGET_SIZE } from "../config/defaults.js";
import { setLogLevel } from "../logging/subsystem.js";
import { renderStyledQrToFile } from "../render/pipeline.js";
import { defaultRuntime } from "../runtime.js";
import { theme } from "../terminal/theme.js";

export type RenderCommandOptions = {
  size?: string;
  fill?: string;
  eye?: string;
  back?: string;
  /** A path, or `false` from `--no-logo`. */
  logo?: string | false;
  output?: string;
  qrVersion?: number;
  ec?: ErrorCorrectionLevel;
  border?: number;
  supersample?: number;
  radius?: number;
  config?: string;
  verbose?: boolean;
};

export type RenderCommandDeps = {
  loadConfig: (opts: { configPath?: string }) => LoadedConfig;
  renderToFile: typeof renderStyledQrToFile;
};

const defaultDeps: RenderCommandDeps = {
  loadConfig,
  renderToFile: renderStyledQrToFile,
};

export function loadConfigOrReport(
  configPath: string | undefined,
  runtime: RuntimeEnv,
  load: RenderCommandDeps["loadConfig"] = loadConfig,
): LoadedConfig | null {
  try {
    return load({ configPath });
  } catch (err) {
    if (err instanceof ConfigError) {
      runtime.error(theme.error(err.message));
      runtime.exit(1);
      return null;
    }
    throw err;
  }
}

function toOverrides(opts: RenderCommandOptions, size: number | undefined): RenderOverrides {
  return {
    size,
    fillColor: opts.fill,
    eyeColor: opts.eye,
    backColor: opts.back,
    logo: opts.logo === false ? null : opts.logo,
    output: opts.output,
    version: opts.qrVersion,
    errorCorrection: opts.ec,
    border: opts.border,
    supersample: opts.supersample,
    moduleRadiusRatio: opts.radius,
  };
}

/** Renders `url` to a file and reports the outcome through the runtime. Returns true on success. */
export async function renderCommand(
  url: string | undefined,
  opts: RenderCommandOptions,
  runtime: RuntimeEnv = defaultRuntime,
  deps: Partial<RenderCommandDeps> = {},
): Promise<boolean> {
  const { loadConfig: load, renderToFile } = { ...defaultDeps, ...deps };
  if (opts.verbose) {
    setLogLevel("debug");
  }

  const payload = url?.trim();
  if (!payload) {
    runtime.error(theme.error("ERROR: URL cannot be empty."));
    runtime.exit(1);
    return false;
  }

  const loaded = loadConfigOrReport(opts.config, runtime, load);
  if (!loaded) {
    return false;
  }

  let size: number | undefined;
  if (opts.size !== undefined) {
    const fallback = loaded.config.defaults?.size ?? DEFAULT_TARGET_SIZE;
    const parsed = parseTargetSize(opts.size, fallback);
    if (parsed.usedFallback) {
      runtime.log(theme.warn(`Invalid number. Using ${fallback}.`));
    }
    size = parsed.size;
  }

  const request = resolveRenderRequest(payload, loaded.config, toOverrides(opts, size));
  const result = await renderToFile(request);
  if (!result.ok) {
    runtime.error(theme.error(`ERROR: ${result.error.message}`));
    runtime.exit(1);
    return false;
  }

  const { image, outputPath } = result.value;
  runtime.log(
    theme.success(`Success! QR code (${image.width}x${image.height}px) saved to: ${outputPath}`),
  );
  return true;
}
