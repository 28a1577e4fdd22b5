/* eslint-disable no-console */

type StepStatus = "ok" | "warn" | "fail";

type Step = {
  end: (status?: StepStatus, detail?: string) => void;
};

const supportsColor = Boolean(process.stdout.isTTY) && process.env.NO_COLOR === undefined;

const colorize = (code: string) => (value: string) =>
  supportsColor ? `\u001b[${code}m${value}\u001b[0m` : value;

const dim = colorize("2");
const green = colorize("32");
const yellow = colorize("33");
const red = colorize("31");
const cyan = colorize("36");

export const formatDuration = (ms: number): string => {
  if (ms < 1000) return `${ms}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(2)}s`;
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${(seconds - minutes * 60).toFixed(1)}s`;
};

const timestamp = (): string => {
  const now = new Date();
  const pad = (value: number) => value.toString().padStart(2, "0");
  return `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`;
};

const statusLabel = (status: StepStatus): string => {
  if (status === "ok") return green("ok");
  if (status === "warn") return yellow("warn");
  return red("fail");
};

export const section = (title: string): void => {
  const rule = "=".repeat(Math.max(40, Math.min(72, title.length + 8)));
  console.log(`\n${rule}\n${cyan(title)}\n${rule}`);
};

export const info = (message: string): void => {
  console.log(`  ${message}`);
};

export const note = (message: string): void => {
  console.log(dim(`  ${message}`));
};

/** Prints page progress on one line when attached to a terminal. */
export const createPageProgress = (label: string): ((processed: number, total: number) => void) => {
  let lastLine = "";
  return (processed, total) => {
    const pct = total > 0 ? Math.round((processed / total) * 100) : 100;
    const line = `${label}: ${processed}/${total} (${pct}%)`;
    if (line === lastLine) return;
    lastLine = line;
    if (process.stdout.isTTY) {
      process.stdout.clearLine(0);
      process.stdout.cursorTo(0);
      process.stdout.write(line);
      if (processed >= total) process.stdout.write("\n");
    } else {
      console.log(`  ${line}`);
    }
  };
};

export const startStep = (label: string): Step => {
  const startedAt = Date.now();
  console.log(`${dim(timestamp())} [start] ${label}`);
  return {
    end: (status: StepStatus = "ok", detail?: string) => {
      const suffix = detail ? ` - ${detail}` : "";
      const duration = formatDuration(Date.now() - startedAt);
      console.log(`${dim(timestamp())} [${statusLabel(status)}] ${label}${suffix} ${dim(`(${duration})`)}`);
    },
  };
};
