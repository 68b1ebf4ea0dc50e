import { GraphicsVariant } from '../types/index.js';

type Env = Record<string, string | undefined>;

/**
 * Visible width of the output terminal: the stream's own column count, then
 * $COLUMNS, then 80.
 */
export function getTerminalWidth(
  stream: { columns?: number } = process.stdout,
  env: Env = process.env
): number {
  if (typeof stream.columns === 'number' && stream.columns > 0) {
    return stream.columns;
  }
  const cols = Number.parseInt(env.COLUMNS ?? '', 10);
  if (Number.isFinite(cols) && cols > 0) {
    return cols;
  }
  return 80;
}

export function isUnicodeTerminal(env: Env = process.env): boolean {
  return ['LC_ALL', 'LC_CTYPE', 'LANG'].some((key) =>
    (env[key] ?? '').toUpperCase().replace('UTF8', 'UTF-8').includes('UTF-8')
  );
}

export function defaultGraphics(env: Env = process.env): GraphicsVariant {
  return isUnicodeTerminal(env) ? GraphicsVariant.Utf8 : GraphicsVariant.Ascii;
}
