/**
 * Per-frame signal reductions used by the scorers. All functions are pure and
 * deterministic; the default thresholds in config.ts are calibrated against
 * exactly these reductions.
 */
import { FLOW_PARAMS, HISTOGRAM_BINS } from '../config.js';

export interface LumaPlane {
  width: number;
  height: number;
  data: Uint8Array;
}

/** BT.601 luma of a packed RGB24 buffer, rounded to 0..255. */
export function toLuma(rgb: Uint8Array, width: number, height: number): LumaPlane {
  const n = width * height;
  if (rgb.length < n * 3) {
    throw new RangeError(`RGB buffer too short: ${rgb.length} < ${n * 3}`);
  }
  const data = new Uint8Array(n);
  for (let i = 0, j = 0; i < n; i++, j += 3) {
    const r = rgb[j] ?? 0;
    const g = rgb[j + 1] ?? 0;
    const b = rgb[j + 2] ?? 0;
    data[i] = Math.round(0.299 * r + 0.587 * g + 0.114 * b);
  }
  return { width, height, data };
}

function assertSameShape(a: LumaPlane, b: LumaPlane): void {
  if (a.width !== b.width || a.height !== b.height) {
    throw new RangeError(`Frame size changed: ${a.width}x${a.height} -> ${b.width}x${b.height}`);
  }
}

// ── Difference ─────────────────────────────────────────────────────────────────

/** Mean absolute per-pixel luma difference, 0..255. */
export function meanAbsoluteDifference(prev: LumaPlane, cur: LumaPlane): number {
  assertSameShape(prev, cur);
  const n = cur.data.length;
  if (n === 0) return 0;
  let sum = 0;
  for (let i = 0; i < n; i++) {
    sum += Math.abs((cur.data[i] ?? 0) - (prev.data[i] ?? 0));
  }
  return sum / n;
}

// ── Histogram ──────────────────────────────────────────────────────────────────

export function lumaHistogram(plane: LumaPlane, bins: number = HISTOGRAM_BINS): Float64Array {
  const hist = new Float64Array(bins);
  for (const v of plane.data) {
    const bin = Math.min(bins - 1, Math.floor((v * bins) / 256));
    hist[bin] = (hist[bin] ?? 0) + 1;
  }
  return hist;
}

/**
 * Bhattacharyya distance between two histograms: 0 for identical
 * distributions, 1 for disjoint ones. Scale-invariant, so raw counts work.
 */
export function bhattacharyyaDistance(a: Float64Array, b: Float64Array): number {
  if (a.length !== b.length) {
    throw new RangeError(`Histogram bin counts differ: ${a.length} vs ${b.length}`);
  }
  let sumA = 0;
  let sumB = 0;
  let overlap = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    sumA += x;
    sumB += y;
    overlap += Math.sqrt(x * y);
  }
  const norm = sumA * sumB;
  const scale = norm > Number.EPSILON ? 1 / Math.sqrt(norm) : 1;
  return Math.sqrt(Math.max(1 - overlap * scale, 0));
}

// ── Optical flow ───────────────────────────────────────────────────────────────

export interface MotionVector {
  x: number;
  y: number;
  dx: number;
  dy: number;
}

interface FlowParams {
  blockSize: number;
  searchRadius: number;
}

function blockSad(
  prev: LumaPlane,
  cur: LumaPlane,
  bx: number,
  by: number,
  dx: number,
  dy: number,
  size: number,
): number {
  const w = cur.width;
  let sad = 0;
  for (let y = 0; y < size; y++) {
    const curRow = (by + y) * w + bx;
    const prevRow = (by + y - dy) * w + bx - dx;
    for (let x = 0; x < size; x++) {
      sad += Math.abs((cur.data[curRow + x] ?? 0) - (prev.data[prevRow + x] ?? 0));
    }
  }
  return sad;
}

/**
 * Block-matching motion field. For each block of `cur`, the displacement
 * (dx, dy) minimises the SAD against `prev` shifted by (-dx, -dy); ties go to
 * the shorter vector. Blocks whose search window leaves the frame are skipped.
 */
export function blockMotionField(
  prev: LumaPlane,
  cur: LumaPlane,
  params: FlowParams = FLOW_PARAMS,
): MotionVector[] {
  assertSameShape(prev, cur);
  const { blockSize: size, searchRadius: r } = params;
  const vectors: MotionVector[] = [];

  for (let by = 0; by + size <= cur.height; by += size) {
    if (by - r < 0 || by + size + r > cur.height) continue;
    for (let bx = 0; bx + size <= cur.width; bx += size) {
      if (bx - r < 0 || bx + size + r > cur.width) continue;

      let bestSad = blockSad(prev, cur, bx, by, 0, 0, size);
      let bestDx = 0;
      let bestDy = 0;
      let bestLen = 0;
      for (let dy = -r; dy <= r; dy++) {
        for (let dx = -r; dx <= r; dx++) {
          if (dx === 0 && dy === 0) continue;
          const sad = blockSad(prev, cur, bx, by, dx, dy, size);
          const len = dx * dx + dy * dy;
          if (sad < bestSad || (sad === bestSad && len < bestLen)) {
            bestSad = sad;
            bestDx = dx;
            bestDy = dy;
            bestLen = len;
          }
        }
      }
      vectors.push({ x: bx, y: by, dx: bestDx, dy: bestDy });
    }
  }
  return vectors;
}

/** Mean motion-vector norm in pixels; 0 when no block could be evaluated. */
export function meanFlowMagnitude(
  prev: LumaPlane,
  cur: LumaPlane,
  params: FlowParams = FLOW_PARAMS,
): number {
  const field = blockMotionField(prev, cur, params);
  if (field.length === 0) return 0;
  let sum = 0;
  for (const v of field) sum += Math.hypot(v.dx, v.dy);
  return sum / field.length;
}
