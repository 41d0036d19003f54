/**
 * Batched data pipeline with a small pool of in-process producers.
 *
 * Workers are async tasks on the main thread, not threads or processes. They
 * overlap only the awaited parts of a collate function (file reads, decoding
 * done off-thread); synchronous collate work still runs between compute steps.
 *
 * Batch k of an epoch is collated by worker k % numWorkers. Each worker handles
 * its batches strictly in order with its own seeded RNG, so augmentation noise
 * depends only on (seed, epoch, worker) and never on scheduling. At most
 * numWorkers * prefetch batches are in flight; they are delivered in index order.
 */
import {
  DataError, SeededRng, describeCause, deriveSeed, positiveInt,
  type Batch, type BatchSource,
} from "@lockstep/core";

export type Collate<I, T> = (items: readonly I[], rng: SeededRng) => T | Promise<T>;

export interface DataLoaderOptions<I, T> {
  readonly items: readonly I[];
  readonly batchSize: number;
  readonly collate: Collate<I, T>;
  /** Identifier reported with a batch when it fails (default: the item index). */
  readonly id?: (item: I, index: number) => string;
  readonly shuffle?: boolean;
  /** Fixed number of samples per epoch, independent of the dataset size. */
  readonly samplesPerEpoch?: number | null;
  readonly dropLast?: boolean;
  readonly seed?: number;
  readonly numWorkers?: number;
  /** Batches each worker may have queued ahead of the consumer. */
  readonly prefetch?: number;
}

type Settled<T> = { readonly ok: true; readonly value: Batch<T> } | { readonly ok: false; readonly error: unknown };

export class DataLoader<I, T> implements BatchSource<T> {
  readonly batchSize: number;
  readonly numWorkers: number;
  readonly prefetch: number;
  readonly seed: number;
  private readonly items: readonly I[];
  private readonly collate: Collate<I, T>;
  private readonly id: (item: I, index: number) => string;
  private readonly shuffle: boolean;
  private readonly samplesPerEpoch: number | null;
  private readonly dropLast: boolean;

  constructor(options: DataLoaderOptions<I, T>) {
    this.items = options.items;
    this.batchSize = options.batchSize;
    this.collate = options.collate;
    this.id = options.id ?? ((_item, index) => String(index));
    this.shuffle = options.shuffle ?? false;
    this.samplesPerEpoch = options.samplesPerEpoch ?? null;
    this.dropLast = options.dropLast ?? false;
    this.seed = options.seed ?? 42;
    this.numWorkers = options.numWorkers ?? 1;
    this.prefetch = options.prefetch ?? 2;

    positiveInt("batchSize", this.batchSize);
    positiveInt("numWorkers", this.numWorkers);
    positiveInt("prefetch", this.prefetch);
    if (this.samplesPerEpoch !== null) positiveInt("samplesPerEpoch", this.samplesPerEpoch);
  }

  get length(): number {
    return this.items.length;
  }

  /** Seed of worker `worker`'s RNG during `epoch`. */
  workerSeed(epoch: number, worker: number): number {
    return deriveSeed(this.seed, epoch, worker + 1);
  }

  /**
   * Item indices visited in `epoch`. With a sample budget, shuffled loaders cycle
   * through fresh permutations and sequential ones continue where the previous
   * epoch stopped.
   */
  indices(epoch: number): number[] {
    const n = this.items.length;
    if (n === 0) return [];
    const total = this.samplesPerEpoch ?? n;
    const out: number[] = [];

    if (this.shuffle) {
      const rng = new SeededRng(deriveSeed(this.seed, epoch, 0));
      while (out.length < total) {
        const perm = Array.from({ length: n }, (_, i) => i);
        for (let i = n - 1; i > 0; i--) {
          const j = rng.nextInt(i + 1);
          [perm[i], perm[j]] = [perm[j], perm[i]];
        }
        out.push(...perm.slice(0, total - out.length));
      }
      return out;
    }

    const start = this.samplesPerEpoch === null ? 0 : (epoch * total) % n;
    for (let i = 0; i < total; i++) out.push((start + i) % n);
    return out;
  }

  batches(epoch: number): AsyncIterable<Batch<T>> {
    return this.iterate(epoch);
  }

  private async *iterate(epoch: number): AsyncGenerator<Batch<T>> {
    const chunks = this.chunk(this.indices(epoch));
    const rngs = Array.from({ length: this.numWorkers }, (_, w) => new SeededRng(this.workerSeed(epoch, w)));
    // Per-worker tail of its job chain; settled promises never reject.
    const tails: Promise<unknown>[] = rngs.map(() => Promise.resolve());
    const queue: Promise<Settled<T>>[] = [];
    const limit = this.numWorkers * this.prefetch;
    let scheduled = 0;

    const schedule = (): void => {
      const k = scheduled++;
      const w = k % this.numWorkers;
      const rng = rngs[w];
      const chunk = chunks[k];
      const job: Promise<Settled<T>> = tails[w].then(() => this.produce(chunk, rng)).then(
        (value): Settled<T> => ({ ok: true, value }),
        (error: unknown): Settled<T> => ({ ok: false, error }),
      );
      tails[w] = job;
      queue.push(job);
    };

    for (let k = 0; k < chunks.length; k++) {
      while (scheduled < chunks.length && queue.length < limit) schedule();
      const head = queue.shift();
      if (!head) break;
      const result = await head;
      if (!result.ok) {
        const ids = chunks[k].map((i) => this.id(this.items[i], i));
        throw new DataError({
          message: `collating batch ${k} [${ids.join(", ")}] of epoch ${epoch + 1} failed: ${describeCause(result.error)}`,
          cause: result.error,
        });
      }
      yield result.value;
    }
  }

  private chunk(indices: readonly number[]): number[][] {
    const out: number[][] = [];
    for (let i = 0; i < indices.length; i += this.batchSize) {
      const c = indices.slice(i, i + this.batchSize);
      if (this.dropLast && c.length < this.batchSize) break;
      out.push(c);
    }
    return out;
  }

  private async produce(chunk: readonly number[], rng: SeededRng): Promise<Batch<T>> {
    const items = chunk.map((i) => this.items[i]);
    const data = await this.collate(items, rng);
    return { ids: chunk.map((i) => this.id(this.items[i], i)), data };
  }
}
