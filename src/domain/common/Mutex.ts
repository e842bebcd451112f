/**
 * Serializes async critical sections on a promise chain.
 * Sections run one at a time in call order; a failing section does not
 * stop the ones queued behind it.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(section: () => T | Promise<T>): Promise<T> {
    const run = this.tail.then(section);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
