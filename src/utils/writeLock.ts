/**
 * Serializes async critical sections. A failed section does not poison
 * the lock for the next caller; the failure is returned to its own caller.
 */
export class WriteLock {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(section: () => Promise<T>): Promise<T> {
    const run = this.tail.then(section);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
