/**
 * Shannon Entropy and Placeholder Shape Helpers
 *
 * Real credentials are random; placeholders tend to be short alphabets,
 * repeats and counting runs.
 */

/**
 * Calculate Shannon entropy of a string
 *
 * @returns bits per character (0-8 for ASCII, typically 3.5-5.0 for real secrets)
 */
export function calculateEntropy(str: string): number {
  if (!str || str.length === 0) {
    return 0;
  }

  const freq = new Map<string, number>();
  for (const char of str) {
    freq.set(char, (freq.get(char) ?? 0) + 1);
  }

  let entropy = 0;
  const len = str.length;

  for (const count of freq.values()) {
    const probability = count / len;
    entropy -= probability * Math.log2(probability);
  }

  return entropy;
}

/**
 * True when the text holds `minSteps` consecutive +1 code point steps
 * (`abcde`, `12345`). Strings shorter than 6 never qualify.
 */
export function hasAscendingRun(text: string, minSteps = 4): boolean {
  if (text.length < 6) {
    return false;
  }

  let steps = 0;
  for (let i = 0; i < text.length - 1; i++) {
    steps = text.charCodeAt(i + 1) === text.charCodeAt(i) + 1 ? steps + 1 : 0;
    if (steps >= minSteps) {
      return true;
    }
  }
  return false;
}

export function distinctCharCount(text: string): number {
  return new Set(text).size;
}
