export type SlotLease = {
  readonly id: number;
  release(): void;
};

/**
 * Capacity-1 mailbox for inference requests. `tryAcquire` never waits: it hands
 * out the only lease or returns null. Releasing a lease twice is a no-op.
 */
export class InferenceSlot {
  private holder: number | null = null;
  private nextId = 1;

  tryAcquire(): SlotLease | null {
    if (this.holder !== null) return null;
    const id = this.nextId++;
    this.holder = id;
    return {
      id,
      release: () => {
        if (this.holder === id) {
          this.holder = null;
        }
      }
    };
  }

  isBusy(): boolean {
    return this.holder !== null;
  }
}
