import { cancel, intro, isCancel, note, outro, text } from "@clack/prompts";
import { theme } from "../terminal/theme.js";
import { WizardCancelledError, type WizardPrompter } from "./prompts.js";

function guardCancel<T>(value: T | symbol): T {
  if (isCancel(value)) {
    cancel("Cancelled.");
    throw new WizardCancelledError();
  }
  return value;
}

export function createClackPrompter(): WizardPrompter {
  return {
    intro: async (title) => {
      intro(theme.heading(title));
    },
    outro: async (message) => {
      outro(message);
    },
    note: async (message, title) => {
      note(message, title);
    },
    text: async (params) => {
      const validate = params.validate;
      return guardCancel(
        await text({
          message: params.message,
          placeholder: params.placeholder,
          defaultValue: params.defaultValue,
          initialValue: params.initialValue,
          validate: validate ? (value) => validate(value) : undefined,
        }),
      );
    },
  };
}
