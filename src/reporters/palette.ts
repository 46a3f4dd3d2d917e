import chalk, { Chalk, type ChalkInstance } from "chalk";

export type LineWriter = (line: string) => void;

export interface ReporterOptions {
  /** Defaults to console.log. */
  write?: LineWriter;
  /** Force colour on or off; chalk's terminal detection decides when unset. */
  color?: boolean;
}

export function createPalette(color: boolean | undefined): ChalkInstance {
  if (color === undefined) return chalk;
  return new Chalk({ level: color ? 1 : 0 });
}

export function centerPad(text: string, width: number, fill: string): string {
  const free = Math.max(0, width - text.length);
  const left = Math.floor(free / 2);
  return fill.repeat(left) + text + fill.repeat(free - left);
}
