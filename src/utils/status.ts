import readline from "node:readline";

type StatusOptions = {
  label?: string;
  intervalMs?: number;
  prefix?: string;
};

export type StatusLine = {
  setLabel: (label: string) => void;
  stop: (finalMessage?: string) => void;
};

/** A single self-rewriting progress line. */
export function startStatusLine(opts: StatusOptions = {}): StatusLine {
  let label = opts.label ?? "Scanning";
  const intervalMs = opts.intervalMs ?? 400;
  const prefix = opts.prefix ?? "";

  // stderr, so JSON and SARIF on stdout stay pipeable
  const stream = process.stderr;
  const interactive = stream.isTTY;

  let dots = 0;
  const render = () => {
    if (!interactive) return;
    dots = (dots % 3) + 1;
    readline.clearLine(stream, 0);
    readline.cursorTo(stream, 0);
    stream.write(`${prefix}${label}${".".repeat(dots)}`);
  };

  render();
  const t = setInterval(render, intervalMs);

  return {
    setLabel(next) {
      label = next;
      render();
    },
    stop(finalMessage) {
      clearInterval(t);
      if (interactive) {
        readline.clearLine(stream, 0);
        readline.cursorTo(stream, 0);
      }
      if (finalMessage) stream.write(finalMessage + "\n");
    },
  };
}
