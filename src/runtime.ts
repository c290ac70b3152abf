import { restoreTerminalState } from "./terminal/restore.js";

export type RuntimeEnv = {
  log: typeof console.log;
  error: typeof console.error;
  exit: (code: number) => never;
};

export const defaultRuntime: RuntimeEnv = {
  log: (...args: Parameters<typeof console.log>) => {
    console.log(...args);
  },
  error: (...args: Parameters<typeof console.error>) => {
    console.error(...args);
  },
  exit: (code) => {
    restoreTerminalState("runtime exit");
    process.exit(code);
  },
};
