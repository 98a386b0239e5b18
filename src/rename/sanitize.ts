/** Characters many filesystems refuse in a file name. */
export const DISALLOWED_CHARACTERS = ["\\", ":", "?", "*", "<", ">", "|", '"', "/"] as const;

export const DEFAULT_SUBSTITUTION_CHAR = "_";

const DISALLOWED_RE = /[\\:?*<>|"/]/g;

/**
 * Replace every disallowed character in `name` with `subChar`.
 * All other characters are left untouched.
 */
export function sanitizeFilename(name: string, subChar: string = DEFAULT_SUBSTITUTION_CHAR): string {
  return name.replace(DISALLOWED_RE, () => subChar);
}

/**
 * Validate a substitution character. Returns an error message, or null when usable.
 */
export function validateSubstitutionChar(value: unknown): string | null {
  if (typeof value !== "string") {
    return "Substitution character must be a string";
  }
  if (Array.from(value).length !== 1) {
    return `Substitution character must be exactly one character, got "${value}"`;
  }
  if (DISALLOWED_CHARACTERS.some((c) => c === value)) {
    return `Substitution character "${value}" is itself disallowed in file names`;
  }
  return null;
}
