/**
 * Noise detection.
 *
 * History files sometimes capture terminal output pasted at the prompt:
 * separator lines, progress bars, long runs of one character. None of these
 * is a command anybody typed, so they are dropped.
 */

/** A single noise signature. */
interface NoisePattern {
  /** Short name used in verbose logs. */
  name: string;
  regex: RegExp;
}

/**
 * All signatures. Order does NOT matter: any match marks the command as noise.
 * The `u` flag makes `.` and `\1` see whole characters, emoji included.
 */
export const NOISE_PATTERNS: readonly NoisePattern[] = [
  { name: 'dash-run', regex: /-{20,}/u },
  { name: 'equals-run', regex: /={20,}/u },
  // Several progress bars on one line: `[###   ] ... ]]]`
  { name: 'progress-bars', regex: /\[.*\]{3,}/u },
  { name: 'whitespace-run', regex: /\s{10,}/u },
  // Same character 16+ times in a row.
  { name: 'repeated-char', regex: /(.)\1{15,}/u },
];

/**
 * Return the name of the first noise signature found in `command`,
 * or `null` if it looks like a real command.
 */
export function findNoisePattern(command: string): string | null {
  for (const pattern of NOISE_PATTERNS) {
    if (pattern.regex.test(command)) return pattern.name;
  }
  return null;
}

export function isNoise(command: string): boolean {
  return findNoisePattern(command) !== null;
}
