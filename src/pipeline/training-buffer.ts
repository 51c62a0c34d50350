import type { TrainingExample } from "./types.js";

/** Bounded FIFO of training examples; the oldest example is evicted first. */
export class TrainingBuffer {
  readonly capacity: number;
  private examples: TrainingExample[] = [];
  private recorded = 0;

  constructor(capacity = 1000) {
    this.capacity = Math.max(1, capacity);
  }

  push(example: TrainingExample): void {
    this.examples.push({ ...example, state: [...example.state] });
    this.recorded += 1;
    if (this.examples.length > this.capacity) {
      this.examples.splice(0, this.examples.length - this.capacity);
    }
  }

  get size(): number {
    return this.examples.length;
  }

  /** Examples recorded since construction, including evicted ones. */
  get totalRecorded(): number {
    return this.recorded;
  }

  /** Copy of the buffered examples in arrival order. */
  snapshot(): TrainingExample[] {
    return this.examples.map((example) => ({ ...example, state: [...example.state] }));
  }

  clear(): void {
    this.examples = [];
  }
}
