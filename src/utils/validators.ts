export const MAX_HOURS_PER_ENTRY = 24;

/**
 * PROJ-123 style keys: exactly one dash with text on both sides.
 */
export function isValidIssueKey(key: string): boolean {
  const parts = key.trim().split('-');
  return parts.length === 2 && parts[0] !== '' && parts[1] !== '';
}

export function normalizeIssueKey(key: string): string {
  return key.trim().toUpperCase();
}

/**
 * A worklog being written must be longer than zero and no more than a day.
 */
export function hoursViolation(hours: number): string | undefined {
  if (!Number.isFinite(hours) || hours <= 0) {
    return 'Time logged must be greater than 0';
  }
  if (hours > MAX_HOURS_PER_ENTRY) {
    return `Time logged cannot exceed ${MAX_HOURS_PER_ENTRY} hours per entry`;
  }
  return undefined;
}
