type Paint = (s: string) => string;
type Stream = { isTTY?: boolean };

/**
 * Ranks and names go to stdout, diagnostics to stderr; colour is on only when
 * both are terminals and NO_COLOR is unset. `--no-color` turns it off as well.
 */
export function colorSupported(
  env: NodeJS.ProcessEnv = process.env,
  streams: Stream[] = [process.stdout, process.stderr],
): boolean {
  if (env.NO_COLOR) return false;
  return streams.every((s) => !!s.isTTY);
}

let enabled = colorSupported();

export function setColorEnabled(v: boolean) {
  enabled = v;
}

function sgr(...codes: number[]): Paint {
  const open = codes.map((c) => `\x1b[${c}m`).join('');
  return (s) => (enabled ? `${open}${s}\x1b[0m` : s);
}

/** Rank numbers, the listener's name and the search query. */
export const highlight = sgr(1, 32);
export const muted = sgr(2);
export const warning = sgr(33);
export const failure = sgr(31);
