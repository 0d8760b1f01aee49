const isRetained = (char: string): boolean => /^[A-Za-z0-9-]$/.test(char);

/**
 * Reduces a free-form name to ASCII letters, digits and hyphens. Every run
 * of other characters collapses to a single underscore, so the output never
 * holds two underscores in a row and sanitizing twice changes nothing.
 */
export const sanitizeName = (input: string): string => {
  let output = "";
  let lastWasUnderscore = false;
  for (const char of input) {
    if (isRetained(char)) {
      output += char;
      lastWasUnderscore = false;
      continue;
    }
    if (!lastWasUnderscore) {
      output += "_";
      lastWasUnderscore = true;
    }
  }
  return output;
};
