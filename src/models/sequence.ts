/**
 * Monotonic integer id generator. Ids start at 1 and are never handed out
 * twice, even after the record that held one is deleted.
 */
export class IdSequence {
  private last = 0;

  next(): number {
    this.last += 1;
    return this.last;
  }
}
