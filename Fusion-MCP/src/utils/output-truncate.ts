/**
 * Head+tail output truncation.
 *
 * When output exceeds the limit, keeps the first `head` characters and the
 * last `tail` characters with a separator in between, so both the first
 * lines of a program's output and its final error survive.
 */

export interface TruncateConfig {
  maxChars: number;
  head: number;
  tail: number;
}

export interface TruncateResult {
  text: string;
  truncated: boolean;
}

export function truncateOutput(
  output: string,
  config: TruncateConfig,
): TruncateResult {
  if (output.length <= config.maxChars || output.length <= config.head + config.tail) {
    return { text: output, truncated: false };
  }

  const dropped = output.length - config.head - config.tail;
  const separator = `\n\n[... truncated ${dropped} characters ...]\n\n`;
  const text =
    output.slice(0, config.head) + separator + output.slice(output.length - config.tail);

  return { text, truncated: true };
}
