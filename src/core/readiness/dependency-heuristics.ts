/**
 * Body-text predicates used to gate items that are waiting on other work.
 * Each one is independent so it can be tested and tuned on its own.
 */

/** Phrases that, followed by an issue reference, mark a dependency */
export const DEPENDENCY_PHRASES = [
  "blocked by",
  "depends on",
  "requires",
  "waiting on",
  "waiting for",
  "after",
] as const;

// "#12" or "owner/repo#12"
const ISSUE_REFERENCE = String.raw`(?:[a-z0-9_.-]+\/[a-z0-9_.-]+)?#\d+`;

const DEPENDENCY_PATTERN = new RegExp(
  String.raw`\b(?:${DEPENDENCY_PHRASES.join("|")})\s+${ISSUE_REFERENCE}`,
  "i"
);

const CHECKBOX_LINE = /^\s*[-*]\s*\[([ xX])\]/gm;

/** True if the body names another issue this one is waiting on */
export function hasDependencyReference(body: string): boolean {
  return DEPENDENCY_PATTERN.test(body.toLowerCase());
}

export interface CheckboxCount {
  total: number;
  unchecked: number;
}

/** Count GitHub task-list lines (`- [ ]`, `* [x]`, ...) */
export function countCheckboxes(body: string): CheckboxCount {
  let total = 0;
  let unchecked = 0;
  for (const match of body.matchAll(CHECKBOX_LINE)) {
    total++;
    if (match[1] === " ") unchecked++;
  }
  return { total, unchecked };
}

/**
 * A body with at least minCheckboxes task-list lines, some still open, is
 * read as a tracking issue whose subtasks are not done yet. A lone checkbox
 * under the default threshold of 2 is a reminder, not a subtask list.
 */
export function isUnfinishedTrackingIssue(body: string, minCheckboxes = 2): boolean {
  const { total, unchecked } = countCheckboxes(body);
  return total >= minCheckboxes && unchecked > 0;
}
