import chalk, { Chalk } from "chalk";

import { resolveEnvConfig } from "../config/env.js";
import type { LevelColor } from "../logging/levels.js";

export type ChalkInstance = InstanceType<typeof Chalk>;

type Paint = (value: string) => string;

export type Theme = {
  /** Timestamp column. */
  time: Paint;
  /** `file` and `line` of the source location. */
  source: Paint;
  severity: Record<LevelColor, Paint>;
};

const baseChalk = resolveEnvConfig().colorDisabled ? new Chalk({ level: 0 }) : chalk;

export function createTheme(color: ChalkInstance): Theme {
  return {
    time: color.magenta,
    source: color.blue,
    severity: {
      green: color.green,
      yellow: color.yellow,
      red: color.red,
      cyan: color.cyan,
    },
  };
}

export const theme = createTheme(baseChalk);

export const plainTheme = createTheme(new Chalk({ level: 0 }));

export const isRich = () => Boolean(baseChalk.level > 0);

export const resolveTheme = (color: boolean): Theme => (color && isRich() ? theme : plainTheme);
