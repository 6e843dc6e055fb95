/**
 * Reusable typed-array buffers for one alignment run.
 *
 * Buffers are keyed by slot name and grow geometrically. A returned view is
 * valid until the same slot is requested again.
 */
export class NumericArena {
  private readonly floats = new Map<string, Float64Array>();
  private readonly ints = new Map<string, Int32Array>();
  private readonly bytes = new Map<string, Uint8Array>();
  private allocations = 0;

  float64(slot: string, length: number, fill?: number): Float64Array {
    let buffer = this.floats.get(slot);
    if (!buffer || buffer.length < length) {
      buffer = new Float64Array(grownCapacity(buffer?.length ?? 0, length));
      this.floats.set(slot, buffer);
      this.allocations += 1;
    }
    const view = buffer.subarray(0, length);
    if (fill !== undefined) {
      view.fill(fill);
    }
    return view;
  }

  int32(slot: string, length: number, fill?: number): Int32Array {
    let buffer = this.ints.get(slot);
    if (!buffer || buffer.length < length) {
      buffer = new Int32Array(grownCapacity(buffer?.length ?? 0, length));
      this.ints.set(slot, buffer);
      this.allocations += 1;
    }
    const view = buffer.subarray(0, length);
    if (fill !== undefined) {
      view.fill(fill);
    }
    return view;
  }

  uint8(slot: string, length: number, fill?: number): Uint8Array {
    let buffer = this.bytes.get(slot);
    if (!buffer || buffer.length < length) {
      buffer = new Uint8Array(grownCapacity(buffer?.length ?? 0, length));
      this.bytes.set(slot, buffer);
      this.allocations += 1;
    }
    const view = buffer.subarray(0, length);
    if (fill !== undefined) {
      view.fill(fill);
    }
    return view;
  }

  /** Number of backing buffers created so far. */
  get allocationCount(): number {
    return this.allocations;
  }

  release(): void {
    this.floats.clear();
    this.ints.clear();
    this.bytes.clear();
  }
}

function grownCapacity(current: number, required: number): number {
  let capacity = Math.max(current, 16);
  while (capacity < required) {
    capacity *= 2;
  }
  return capacity;
}
