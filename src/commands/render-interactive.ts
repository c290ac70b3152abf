import type { RuntimeEnv } from "../runtime.js";
import type { WizardPrompter } from "../wizard/prompts.js";
import { resolveRenderRequest } from "../config/config.js";
import { defaultRuntime } from "../runtime.js";
import { restoreTerminalState } from "../terminal/restore.js";
import { createClackPrompter } from "../wizard/clack-prompter.js";
import { WizardCancelledError } from "../wizard/prompts.js";
import { runRenderWizard } from "../wizard/render-wizard.js";
import {
  loadConfigOrReport,
  renderCommand,
  type RenderCommandDeps,
  type RenderCommandOptions,
} from "./render.js";

export async function runInteractiveRender(
  opts: RenderCommandOptions,
  runtime: RuntimeEnv = defaultRuntime,
  prompter: WizardPrompter = createClackPrompter(),
  deps: Partial<RenderCommandDeps> = {},
): Promise<void> {
  try {
    const loaded = loadConfigOrReport(opts.config, runtime, deps.loadConfig);
    if (!loaded) {
      return;
    }
    const defaults = resolveRenderRequest("", loaded.config, {
      logo: opts.logo === false ? null : opts.logo,
      fillColor: opts.fill,
      eyeColor: opts.eye,
      output: opts.output,
    });

    await prompter.intro("Custom QR Code Generator");
    await prompter.note("Press Enter to use the default value.");
    const answers = await runRenderWizard(prompter, {
      size: defaults.targetSize,
      fillColor: defaults.fillColor,
      eyeColor: defaults.eyeColor,
      logo: defaults.logoPath ?? "",
      output: defaults.outputPath,
    });

    runtime.log("...Generating QR code...");
    const ok = await renderCommand(
      answers.url,
      {
        ...opts,
        size: String(answers.size),
        fill: answers.fillColor,
        eye: answers.eyeColor,
        logo: answers.logo || false,
        output: answers.output,
      },
      runtime,
      deps,
    );
    if (ok) {
      await prompter.outro("Done.");
    }
  } catch (err) {
    if (err instanceof WizardCancelledError) {
      runtime.exit(0);
      return;
    }
    throw err;
  } finally {
    restoreTerminalState("render wizard finish");
  }
}
