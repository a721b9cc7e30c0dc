/**
 * Heuristics for picking a human prompt worth showing in a session list.
 *
 * The first `user` entry of a transcript is often system noise: tool-use
 * interruption markers, slash-command wrappers, injected reminders.
 */

const NON_DISPLAYABLE_PREFIXES = [
  "[request interrupted",
  "<local-command-caveat",
  "<local-command-stdout",
  "<command-name>",
  "<command-message>",
  "<system-reminder>",
  "caveat: the messages below",
  "/resume",
];

const DISPLAY_MAX_CHARS = 200;

/** True if `text` looks like a real prompt with enough substance to show. */
export function isDisplayableMessage(text: string): boolean {
  const trimmed = text.trim();
  if (trimmed.length < 5) return false;

  const lower = trimmed.toLowerCase();
  for (const prefix of NON_DISPLAYABLE_PREFIXES) {
    if (lower.startsWith(prefix)) return false;
  }

  return true;
}

/** Collapse whitespace and cut to a single display line. */
export function toDisplayLine(text: string, maxChars = DISPLAY_MAX_CHARS): string {
  const line = text.replace(/\s+/g, " ").trim();
  return line.length > maxChars ? line.slice(0, maxChars - 1) + "…" : line;
}
