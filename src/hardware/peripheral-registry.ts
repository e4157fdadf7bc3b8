/**
 * PeripheralRegistry: hardware address → peripheral instance
 *
 * A peripheral is created at most once per address and then belongs to
 * the controller that owns the registry. A failed creation is not
 * remembered, so the next command for that address tries again.
 */

export class PeripheralRegistry<T> {
  readonly kind: string;
  private readonly items = new Map<number, T>();

  constructor(kind: string) {
    this.kind = kind;
  }

  /** Return the peripheral at `address`, creating it on first use */
  acquire(address: number, create: (address: number) => T): T {
    const existing = this.items.get(address);
    if (existing !== undefined) return existing;

    const created = create(address);
    this.items.set(address, created);
    return created;
  }

  get(address: number): T | undefined {
    return this.items.get(address);
  }

  has(address: number): boolean {
    return this.items.has(address);
  }

  remove(address: number): T | undefined {
    const item = this.items.get(address);
    this.items.delete(address);
    return item;
  }

  addresses(): number[] {
    return [...this.items.keys()].sort((a, b) => a - b);
  }

  entries(): Array<[number, T]> {
    return [...this.items.entries()];
  }

  clear(): void {
    this.items.clear();
  }

  get size(): number {
    return this.items.size;
  }
}
