import { muted } from './colors';

export type Spinner = {
  start: (text?: string) => void;
  stop: () => void;
};

/**
 * Braille spinner drawn on stderr so that piped stdout stays clean.
 * A disabled spinner is a no-op, which is what non-TTY runs and --verbose get.
 */
export function createSpinner(
  enabled: boolean,
  intervalMs = 80,
  stream: { write: (chunk: string) => unknown } = process.stderr,
): Spinner {
  const frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
  let frameIdx = 0;
  let timer: NodeJS.Timeout | null = null;
  let lastText = 'loading';

  const start = (text?: string) => {
    if (!enabled || timer) return;
    if (text) lastText = text;
    timer = setInterval(() => {
      const txt = muted(`  ${frames[frameIdx]} ${lastText}`);
      frameIdx = (frameIdx + 1) % frames.length;
      stream.write(`\r${txt}`);
    }, intervalMs);
  };

  const stop = () => {
    if (timer) clearInterval(timer);
    timer = null;
    if (enabled) stream.write('\r\x1b[2K');
  };

  return { start, stop };
}

/** Run `task` with the spinner showing `text`, always clearing it afterwards. */
export async function withSpinner<T>(spinner: Spinner, text: string, task: () => Promise<T>) {
  spinner.start(text);
  try {
    return await task();
  } finally {
    spinner.stop();
  }
}
