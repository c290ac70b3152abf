import { parseTargetSize } from "../cli/parse-size.js";
import type { WizardPrompter } from "./prompts.js";

export type RenderWizardDefaults = {
  size: number;
  fillColor: string;
  eyeColor: string;
  logo: string;
  output: string;
};

export type RenderWizardAnswers = {
  url: string;
  size: number;
  fillColor: string;
  eyeColor: string;
  logo: string;
  output: string;
};

async function askWithDefault(
  prompter: WizardPrompter,
  message: string,
  fallback: string,
): Promise<string> {
  const answer = await prompter.text({
    message: `${message} [${fallback}]`,
    placeholder: fallback,
    defaultValue: fallback,
  });
  return answer.trim() || fallback;
}

/**
 * Collects the render inputs one at a time. Only the URL is required; every
 * other answer falls back to its default when left empty.
 */
export async function runRenderWizard(
  prompter: WizardPrompter,
  defaults: RenderWizardDefaults,
): Promise<RenderWizardAnswers> {
  let url = "";
  while (!url) {
    url = (
      await prompter.text({
        message: "Enter URL (required)",
        validate: (value) => (value.trim() ? undefined : "URL cannot be empty."),
      })
    ).trim();
    if (!url) {
      await prompter.note("URL cannot be empty.", "Error");
    }
  }

  const sizeRaw = await prompter.text({
    message: `Desired size (width) [${defaults.size}]`,
    placeholder: String(defaults.size),
  });
  const parsedSize = parseTargetSize(sizeRaw, defaults.size);
  if (parsedSize.usedFallback) {
    await prompter.note(`Invalid number. Using ${defaults.size}.`, "Size");
  }

  const fillColor = await askWithDefault(
    prompter,
    "Module color (e.g. red, #FFFFFF)",
    defaults.fillColor,
  );
  const eyeColor = await askWithDefault(prompter, "Eye color (e.g. red, #FF0000)", defaults.eyeColor);
  const logo = await askWithDefault(prompter, "Path to logo", defaults.logo);
  const output = await askWithDefault(prompter, "Output filename", defaults.output);

  return { url, size: parsedSize.size, fillColor, eyeColor, logo, output };
}
