import chalk, { Chalk } from "chalk";

const hasForceColor =
  typeof process.env.FORCE_COLOR === "string" &&
  process.env.FORCE_COLOR.trim().length > 0 &&
  process.env.FORCE_COLOR.trim() !== "0";

const baseChalk = process.env.NO_COLOR && !hasForceColor ? new Chalk({ level: 0 }) : chalk;

export const theme = {
  success: baseChalk.green,
  successStrong: baseChalk.bold.green,
  warn: baseChalk.yellow,
  error: baseChalk.red,
  errorStrong: baseChalk.bold.red,
  muted: baseChalk.dim,
  strong: baseChalk.bold,
  header: baseChalk.bold.yellow.dim,
  title: baseChalk.bold.cyan,
  port: baseChalk.yellow,
} as const;

export type ThemeColor = (value: string) => string;

export const isRich = () => Boolean(baseChalk.level > 0);

export const colorize = (rich: boolean, color: ThemeColor, value: string) =>
  rich ? color(value) : value;
