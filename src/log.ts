export const COLOR = {
  reset: "\x1b[0m",
  gray: (s: string) => `\x1b[90m${s}${COLOR.reset}`,
  cyan: (s: string) => `\x1b[36m${s}${COLOR.reset}`,
  green: (s: string) => `\x1b[32m${s}${COLOR.reset}`,
  yellow: (s: string) => `\x1b[33m${s}${COLOR.reset}`,
  red: (s: string) => `\x1b[31m${s}${COLOR.reset}`,
  magenta: (s: string) => `\x1b[35m${s}${COLOR.reset}`,
};

const QUIET = process.env.QUIET === "1";
export const LOG_STEPS = !QUIET && (process.env.LOG_STEPS ?? "1") !== "0";
export const LOG_COMMANDS = !QUIET && (process.env.LOG_COMMANDS ?? "0") === "1";

export const fmtMs = (ms: number) => (ms >= 10_000 ? `${(ms / 1000).toFixed(1)}s` : `${Math.round(ms)}ms`);

export function fmtBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB", "TB"];
  let value = bytes;
  let ix = 0;
  while (value >= 1024 && ix < units.length - 1) {
    value /= 1024;
    ix += 1;
  }
  const shown = value >= 10 || value % 1 === 0 ? value.toFixed(0) : value.toFixed(1);
  return `${shown} ${units[ix]}`;
}

export function info(msg: string) {
  if (!QUIET) console.log(msg);
}

export function warn(msg: string) {
  console.warn(COLOR.yellow(`[warn] ${msg}`));
}

export function command(cmd: string, args: string[], cwd: string) {
  if (LOG_COMMANDS) console.log(COLOR.gray(`    $ ${[cmd, ...args].join(" ")}  (in ${cwd})`));
}
