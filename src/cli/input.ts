const INTEGER_PATTERN = /^[+-]?\d+$/;

/** Parses a typed task id; anything other than a whole number yields null. */
export function parseTaskId(text: string): number | null {
  const trimmed = text.trim();
  if (!INTEGER_PATTERN.test(trimmed)) return null;
  return Number(trimmed);
}

export function blankToUndefined(text: string): string | undefined {
  const trimmed = text.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}
