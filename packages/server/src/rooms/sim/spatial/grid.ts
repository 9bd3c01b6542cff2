import { segmentPointDistanceSq } from "../math.js";

type Bucket = {
  actors: number[];
  powerUps: number[];
};

export type GridQueryType = keyof Bucket;

export type GridEntity = {
  type: GridQueryType;
  id: number;
  x: number;
  y: number;
  // Where the entity started the tick; inserted as a swept segment when present.
  fromX?: number;
  fromY?: number;
  radius?: number;
};

/**
 * Cell size for a grid whose 3x3 neighbourhood must contain every possible contact:
 * two of the largest bodies plus the furthest an actor can travel in one tick.
 */
export function cellSizeFor(maxRadius: number, maxDisplacement: number): number {
  return Math.max(1, Math.ceil(2 * maxRadius + maxDisplacement));
}

export class SpatialGrid {
  readonly cellSize: number;
  private readonly buckets = new Map<string, Bucket>();

  constructor(cellSize: number) {
    this.cellSize = Math.max(1, Math.floor(cellSize));
  }

  clear() {
    this.buckets.clear();
  }

  clearAndRebuild(entities: readonly GridEntity[]) {
    this.clear();
    for (const e of entities) {
      if (e.fromX !== undefined && e.fromY !== undefined) {
        this.insertSwept(e.type, e.id, e.fromX, e.fromY, e.x, e.y, e.radius ?? 0);
      } else {
        this.insert(e.type, e.id, e.x, e.y);
      }
    }
  }

  insert(type: GridQueryType, id: number, x: number, y: number) {
    const key = this.keyFor(x, y);
    const bucket = this.buckets.get(key) ?? this.createBucket(key);
    bucket[type].push(id);
  }

  /** Register an entity in every cell its swept path (a capsule of `radius`) touches. */
  insertSwept(type: GridQueryType, id: number, x0: number, y0: number, x1: number, y1: number, radius: number) {
    for (const [cx, cy] of this.cellsAlongSegment(x0, y0, x1, y1, radius)) {
      const key = this.keyForCell(cx, cy);
      const bucket = this.buckets.get(key) ?? this.createBucket(key);
      const list = bucket[type];
      if (list[list.length - 1] !== id) list.push(id);
    }
  }

  queryRadius(x: number, y: number, radius: number, types: readonly GridQueryType[]): number[] {
    const r = Math.max(0, radius);
    const result = new Set<number>();
    const minX = this.cellCoord(x - r);
    const maxX = this.cellCoord(x + r);
    const minY = this.cellCoord(y - r);
    const maxY = this.cellCoord(y + r);

    for (let cx = minX; cx <= maxX; cx++) {
      for (let cy = minY; cy <= maxY; cy++) {
        this.collect(cx, cy, types, result);
      }
    }
    return [...result].sort((a, b) => a - b);
  }

  /** Swept query: everything near the segment a body travelled this tick. */
  querySegment(
    x0: number,
    y0: number,
    x1: number,
    y1: number,
    radius: number,
    types: readonly GridQueryType[],
  ): number[] {
    const result = new Set<number>();
    for (const [cx, cy] of this.cellsAlongSegment(x0, y0, x1, y1, radius)) {
      this.collect(cx, cy, types, result);
    }
    return [...result].sort((a, b) => a - b);
  }

  get occupiedCells(): number {
    return this.buckets.size;
  }

  private collect(cx: number, cy: number, types: readonly GridQueryType[], into: Set<number>) {
    const bucket = this.buckets.get(this.keyForCell(cx, cy));
    if (!bucket) return;
    for (const t of types) {
      for (const id of bucket[t]) into.add(id);
    }
  }

  private *cellsAlongSegment(
    x0: number,
    y0: number,
    x1: number,
    y1: number,
    radius: number,
  ): Generator<[number, number]> {
    const r = Math.max(0, radius);
    const minX = this.cellCoord(Math.min(x0, x1) - r);
    const maxX = this.cellCoord(Math.max(x0, x1) + r);
    const minY = this.cellCoord(Math.min(y0, y1) - r);
    const maxY = this.cellCoord(Math.max(y0, y1) + r);
    // A cell can touch the capsule only if its center is within r + half diagonal of the segment.
    const reach = r + this.cellSize * Math.SQRT1_2;
    const reachSq = reach * reach;
    const half = this.cellSize / 2;

    for (let cx = minX; cx <= maxX; cx++) {
      for (let cy = minY; cy <= maxY; cy++) {
        const centerX = cx * this.cellSize + half;
        const centerY = cy * this.cellSize + half;
        if (segmentPointDistanceSq(x0, y0, x1, y1, centerX, centerY) <= reachSq) {
          yield [cx, cy];
        }
      }
    }
  }

  private cellCoord(v: number): number {
    return Math.floor(v / this.cellSize);
  }

  private keyFor(x: number, y: number): string {
    return this.keyForCell(this.cellCoord(x), this.cellCoord(y));
  }

  private keyForCell(cx: number, cy: number): string {
    return `${cx},${cy}`;
  }

  private createBucket(key: string): Bucket {
    const bucket: Bucket = { actors: [], powerUps: [] };
    this.buckets.set(key, bucket);
    return bucket;
  }
}
