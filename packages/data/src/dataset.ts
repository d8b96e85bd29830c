import type { Datapoint } from "./datapoint.js";
import type { Label } from "./label.js";

/** Ordered collection of datapoints. No deduplication or indexing. */
export class Dataset implements Iterable<Datapoint> {
  private readonly _datapoints: Datapoint[];

  constructor(datapoints: Iterable<Datapoint> = []) {
    this._datapoints = [...datapoints];
  }

  get datapoints(): readonly Datapoint[] {
    return this._datapoints;
  }

  size(): number {
    return this._datapoints.length;
  }

  add(datapoint: Datapoint): void {
    this._datapoints.push(datapoint);
  }

  /** Number of datapoints per label. */
  counts(): Record<Label, number> {
    const counts: Record<Label, number> = { real: 0, fake: 0 };
    for (const dp of this._datapoints) counts[dp.label]++;
    return counts;
  }

  [Symbol.iterator](): Iterator<Datapoint> {
    return this._datapoints[Symbol.iterator]();
  }
}
