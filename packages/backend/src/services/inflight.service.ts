// Test ids with a job in progress, keyed case-insensitively since the id
// becomes a file name and some filesystems ignore case.
const running = new Set<string>();

function key(testId: string): string {
  return testId.toLowerCase();
}

/** Returns false when a job with this id is already running. */
export function claimTestId(testId: string): boolean {
  const k = key(testId);
  if (running.has(k)) return false;
  running.add(k);
  return true;
}

export function releaseTestId(testId: string): void {
  running.delete(key(testId));
}

export function getRunningCount(): number {
  return running.size;
}
