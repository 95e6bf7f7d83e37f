/**
 * Author name splitting.
 *
 * Rules, first match wins:
 *   "Family, Given"  → split on the first comma
 *   "Family; Given"  → split on the first semicolon
 *   "Given Family"   → split on the first space
 *   "Mononym"        → given name only
 */

export interface SplitName {
  given: string;
  family: string;
}

export function splitName(raw: string): SplitName {
  const name = raw.trim();

  for (const separator of [",", ";"]) {
    const at = name.indexOf(separator);
    if (at !== -1) {
      return {
        family: name.slice(0, at).trim(),
        given: name.slice(at + 1).trim(),
      };
    }
  }

  const space = name.indexOf(" ");
  if (space !== -1) {
    return {
      given: name.slice(0, space).trim(),
      family: name.slice(space + 1).trim(),
    };
  }

  return { given: name, family: "" };
}

/** "Family, Given", without a dangling separator when either part is empty */
export function formatCreatorName({ given, family }: SplitName): string {
  return `${family}, ${given}`.replace(/^[ ,]+|[ ,]+$/g, "");
}
