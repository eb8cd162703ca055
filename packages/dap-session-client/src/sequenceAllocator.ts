/**
 * Hands out request sequence numbers. Starts at 1 and only ever increases,
 * across reconnects too.
 */
export class SequenceAllocator {
  private last = 0;

  public next(): number {
    this.last += 1;
    return this.last;
  }
}
