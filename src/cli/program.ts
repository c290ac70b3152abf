import { Command, Option } from "commander";
import type { RuntimeEnv } from "../runtime.js";
import { runInteractiveRender } from "../commands/render-interactive.js";
import { renderCommand, type RenderCommandOptions } from "../commands/render.js";
import { MAX_QR_VERSION, MIN_QR_VERSION } from "../qr/matrix.js";
import { defaultRuntime } from "../runtime.js";
import { VERSION } from "../version.js";
import { parseErrorCorrectionOption, parseIntegerOption, parseRatioOption } from "./parse-options.js";

export type ProgramDeps = {
  runtime: RuntimeEnv;
  isInteractive: () => boolean;
  render: typeof renderCommand;
  renderInteractive: typeof runInteractiveRender;
};

export function buildProgram(overrides: Partial<ProgramDeps> = {}): Command {
  const deps: ProgramDeps = {
    runtime: defaultRuntime,
    isInteractive: () => Boolean(process.stdin.isTTY),
    render: renderCommand,
    renderInteractive: runInteractiveRender,
    ...overrides,
  };

  const program = new Command();
  program
    .name("qr-styler")
    .description("Render QR codes with rounded modules, custom eyes and an embedded logo")
    .version(VERSION);

  program
    .command("render", { isDefault: true })
    .description("Render a styled QR code image (prompts for missing input on a TTY)")
    .argument("[url]", "payload to encode")
    .option("-s, --size <px>", "output width in pixels")
    .option("--fill <color>", "module color (name or hex)")
    .option("--eye <color>", "eye marker color (name or hex)")
    .option("--back <color>", "background color (name or hex)")
    .option("--logo <path>", "logo image placed in the centre")
    .option("--no-logo", "render without a logo")
    .option("-o, --output <file>", "output image path")
    .option(
      "--qr-version <n>",
      `QR version (${MIN_QR_VERSION}-${MAX_QR_VERSION})`,
      parseIntegerOption(1),
    )
    .addOption(
      new Option("--ec <level>", "error correction level (L, M, Q, H)").argParser(
        parseErrorCorrectionOption,
      ),
    )
    .option("--border <modules>", "quiet zone width in modules", parseIntegerOption(0))
    .option("--supersample <factor>", "supersampling factor (1-8)", parseIntegerOption(1, 8))
    .option("--radius <ratio>", "module corner radius as a fraction of the module (0-1)", parseRatioOption)
    .option("--config <path>", "config file (JSON5)")
    .option("--verbose", "debug logging", false)
    .action(async (url: string | undefined, opts: RenderCommandOptions) => {
      if (url?.trim()) {
        await deps.render(url, opts, deps.runtime);
        return;
      }
      if (deps.isInteractive()) {
        await deps.renderInteractive(opts, deps.runtime);
        return;
      }
      deps.runtime.error("ERROR: URL cannot be empty. Pass it as an argument or run in a terminal.");
      deps.runtime.exit(1);
    });

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  await buildProgram().parseAsync(argv);
}
