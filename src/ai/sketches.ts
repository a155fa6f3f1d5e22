/**
 * Mergeable accumulators used by the chunked analysis path.
 *
 * Every accumulator supports `add` for single values and `merge` for combining
 * the partial result of another chunk. Merging must give the same answer (up
 * to floating point, or the sketch's error bound) as feeding all values into a
 * single accumulator.
 */

// ── Moments (Welford + Chan) ────────────────────────────────────────

export class MomentAccumulator {
  count = 0;
  mean = 0;
  m2 = 0;
  sum = 0;
  min = Number.POSITIVE_INFINITY;
  max = Number.NEGATIVE_INFINITY;

  add(x: number): void {
    this.count += 1;
    const delta = x - this.mean;
    this.mean += delta / this.count;
    this.m2 += delta * (x - this.mean);
    this.sum += x;
    if (x < this.min) this.min = x;
    if (x > this.max) this.max = x;
  }

  merge(other: MomentAccumulator): void {
    if (other.count === 0) return;
    if (this.count === 0) {
      this.count = other.count;
      this.mean = other.mean;
      this.m2 = other.m2;
      this.sum = other.sum;
      this.min = other.min;
      this.max = other.max;
      return;
    }

    const total = this.count + other.count;
    const delta = other.mean - this.mean;
    this.mean += (delta * other.count) / total;
    this.m2 += other.m2 + (delta * delta * this.count * other.count) / total;
    this.count = total;
    this.sum += other.sum;
    if (other.min < this.min) this.min = other.min;
    if (other.max > this.max) this.max = other.max;
  }

  /** Sample variance (n - 1). Zero for fewer than two values. */
  get variance(): number {
    return this.count > 1 ? this.m2 / (this.count - 1) : 0;
  }

  get std(): number {
    return Math.sqrt(this.variance);
  }
}

// ── Co-moments for Pearson correlation ─────────────────────────────

export class CoMomentAccumulator {
  count = 0;
  meanX = 0;
  meanY = 0;
  m2X = 0;
  m2Y = 0;
  cXY = 0;

  add(x: number, y: number): void {
    this.count += 1;
    const dx = x - this.meanX;
    this.meanX += dx / this.count;
    const dy = y - this.meanY;
    this.meanY += dy / this.count;
    this.m2X += dx * (x - this.meanX);
    this.m2Y += dy * (y - this.meanY);
    this.cXY += dx * (y - this.meanY);
  }

  merge(other: CoMomentAccumulator): void {
    if (other.count === 0) return;
    if (this.count === 0) {
      Object.assign(this, {
        count: other.count,
        meanX: other.meanX,
        meanY: other.meanY,
        m2X: other.m2X,
        m2Y: other.m2Y,
        cXY: other.cXY,
      });
      return;
    }

    const total = this.count + other.count;
    const dx = other.meanX - this.meanX;
    const dy = other.meanY - this.meanY;
    const weight = (this.count * other.count) / total;

    this.m2X += other.m2X + dx * dx * weight;
    this.m2Y += other.m2Y + dy * dy * weight;
    this.cXY += other.cXY + dx * dy * weight;
    this.meanX += (dx * other.count) / total;
    this.meanY += (dy * other.count) / total;
    this.count = total;
  }

  /** Pearson r, or null when either side has no variance. */
  correlation(): number | null {
    if (this.count < 2 || this.m2X === 0 || this.m2Y === 0) return null;
    return this.cXY / Math.sqrt(this.m2X * this.m2Y);
  }
}

// ── HyperLogLog ─────────────────────────────────────────────────────

function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

// MurmurHash3 finalizer, spreads FNV output across all 32 bits
function fmix32(h: number): number {
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h >>> 0;
}

export class HyperLogLog {
  private readonly registers: Uint8Array;
  private readonly m: number;

  constructor(readonly precision = 14) {
    this.m = 1 << precision;
    this.registers = new Uint8Array(this.m);
  }

  add(value: string): void {
    const hash = fmix32(fnv1a(value));
    const index = hash >>> (32 - this.precision);
    const remaining = (hash << this.precision) >>> 0;
    const rank = remaining === 0 ? 32 - this.precision + 1 : Math.clz32(remaining) + 1;
    if (rank > (this.registers[index] ?? 0)) {
      this.registers[index] = rank;
    }
  }

  merge(other: HyperLogLog): void {
    if (other.precision !== this.precision) {
      throw new RangeError('Cannot merge HyperLogLog sketches of different precision');
    }
    for (let i = 0; i < this.m; i++) {
      const theirs = other.registers[i] ?? 0;
      if (theirs > (this.registers[i] ?? 0)) this.registers[i] = theirs;
    }
  }

  estimate(): number {
    let harmonic = 0;
    let zeros = 0;
    for (const register of this.registers) {
      harmonic += 2 ** -register;
      if (register === 0) zeros += 1;
    }

    const alpha = 0.7213 / (1 + 1.079 / this.m);
    const raw = (alpha * this.m * this.m) / harmonic;

    if (raw <= 2.5 * this.m && zeros > 0) {
      return Math.round(this.m * Math.log(this.m / zeros));
    }
    return Math.round(raw);
  }
}

// ── Space-saving heavy hitters ──────────────────────────────────────

export class SpaceSaving {
  private readonly counters = new Map<string, number>();

  constructor(readonly capacity = 64) {}

  add(value: string, weight = 1): void {
    const current = this.counters.get(value);
    if (current !== undefined) {
      this.counters.set(value, current + weight);
      return;
    }
    if (this.counters.size < this.capacity) {
      this.counters.set(value, weight);
      return;
    }

    let minKey = '';
    let minCount = Number.POSITIVE_INFINITY;
    for (const [key, count] of this.counters) {
      if (count < minCount) {
        minKey = key;
        minCount = count;
      }
    }
    this.counters.delete(minKey);
    this.counters.set(value, minCount + weight);
  }

  merge(other: SpaceSaving): void {
    for (const [key, count] of other.counters) {
      this.add(key, count);
    }
  }

  /** Most frequent values, count descending then value ascending. */
  top(limit: number): Array<{ value: string; count: number }> {
    return [...this.counters.entries()]
      .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
      .slice(0, limit)
      .map(([value, count]) => ({ value, count }));
  }
}

// ── Quantile sketch ─────────────────────────────────────────────────

/**
 * Compacting quantile sketch. Level `h` holds items of weight 2^h; a full
 * level is sorted and every other item is promoted, alternating the kept
 * parity so rounding errors cancel. Exact while nothing has been compacted.
 */
export class QuantileSketch {
  private levels: number[][] = [[]];
  private parity: boolean[] = [false];

  constructor(readonly capacity = 1024) {}

  add(x: number): void {
    this.level(0).push(x);
    if (this.level(0).length >= this.capacity) this.compact(0);
  }

  merge(other: QuantileSketch): void {
    other.levels.forEach((items, h) => {
      this.level(h).push(...items);
    });
    for (let h = 0; h < this.levels.length; h++) {
      if (this.level(h).length >= this.capacity) this.compact(h);
    }
  }

  get count(): number {
    return this.levels.reduce((total, items, h) => total + items.length * 2 ** h, 0);
  }

  quantile(q: number): number {
    if (this.count === 0) return Number.NaN;

    if (this.levels.length === 1) {
      return interpolatedQuantile([...this.level(0)].sort((a, b) => a - b), q);
    }

    const weighted = this.levels
      .flatMap((items, h) => items.map((value) => ({ value, weight: 2 ** h })))
      .sort((a, b) => a.value - b.value);

    const target = q * this.count;
    let cumulative = 0;
    for (const item of weighted) {
      cumulative += item.weight;
      if (cumulative >= target) return item.value;
    }
    return weighted[weighted.length - 1]?.value ?? Number.NaN;
  }

  private level(h: number): number[] {
    let items = this.levels[h];
    if (!items) {
      items = [];
      this.levels[h] = items;
      this.parity[h] = false;
    }
    return items;
  }

  private compact(h: number): void {
    const sorted = this.level(h).sort((a, b) => a - b);
    const offset = this.parity[h] ? 1 : 0;
    this.parity[h] = !this.parity[h];

    // An odd leftover stays at this level so no weight is lost
    const keep = sorted.length % 2 === 1 ? [sorted.pop() ?? 0] : [];
    const promoted = sorted.filter((_, i) => i % 2 === offset);

    this.levels[h] = keep;
    this.level(h + 1).push(...promoted);
    if (this.level(h + 1).length >= this.capacity) this.compact(h + 1);
  }
}

/** Linear interpolation between closest ranks over sorted values. */
export function interpolatedQuantile(sorted: number[], q: number): number {
  if (sorted.length === 0) return Number.NaN;
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const lowValue = sorted[lower] ?? Number.NaN;
  const highValue = sorted[upper] ?? Number.NaN;
  return lowValue + (highValue - lowValue) * (position - lower);
}
