export type WizardTextParams = {
  message: string;
  placeholder?: string;
  /** Returned when the user submits an empty answer. */
  defaultValue?: string;
  initialValue?: string;
  validate?: (value: string) => string | undefined;
};

export type WizardPrompter = {
  intro: (title: string) => Promise<void>;
  outro: (message: string) => Promise<void>;
  note: (message: string, title?: string) => Promise<void>;
  text: (params: WizardTextParams) => Promise<string>;
};

export class WizardCancelledError extends Error {
  constructor(message = "wizard cancelled") {
    super(message);
    this.name = "WizardCancelledError";
  }
}
