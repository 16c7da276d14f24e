// ANSI styling for CLI output. Disabled by NO_COLOR, forced by FORCE_COLOR,
// otherwise on only when stdout is a terminal. Each style closes with its own
// reset code so styles nest: bold(red("x")) keeps the bold after the red ends.

function isEnabled(): boolean {
  if ("NO_COLOR" in process.env) {
    return false;
  }
  if ("FORCE_COLOR" in process.env) {
    return true;
  }
  return process.stdout.isTTY ?? false;
}

type Style = (text: string) => string;

function style(open: number, close: number): Style {
  return (text) => (isEnabled() ? `\x1b[${open}m${text}\x1b[${close}m` : text);
}

export const bold = style(1, 22);
export const dim = style(2, 22);

export const red = style(31, 39);
export const green = style(32, 39);
export const yellow = style(33, 39);
