import chalk, { Chalk } from "chalk";

const palette = {
  accent: "#2F80ED",
  success: "#2FBF71",
  warn: "#F2A93B",
  error: "#E5484D",
  muted: "#8B8D98",
} as const;

const base = process.env.NO_COLOR ? new Chalk({ level: 0 }) : chalk;

export const theme = {
  heading: base.bold.hex(palette.accent),
  accent: base.hex(palette.accent),
  success: base.hex(palette.success),
  warn: base.hex(palette.warn),
  error: base.hex(palette.error),
  muted: base.hex(palette.muted),
  command: base.bold,
};
