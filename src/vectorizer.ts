// Feature-hashing vectorizer + vector math (small + predictable, no model download)

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

export function tokenize(s: string): string[] {
  return (s || '')
    .toLowerCase()
    .replace(/[^a-z0-9_\/\.\-]+/g, ' ')
    .split(' ')
    .filter(t => t.length > 1);
}

// 32-bit FNV-1a over UTF-16 code units
export function hashToken(token: string): number {
  let h = FNV_OFFSET;
  for (let i = 0; i < token.length; i++) {
    h ^= token.charCodeAt(i);
    h = Math.imul(h, FNV_PRIME) >>> 0;
  }
  return h;
}

/** Term counts folded into `dimension` buckets. Components are never negative. */
export function hashingVector(text: string, dimension: number): number[] {
  const v = new Array<number>(dimension).fill(0);
  for (const tok of tokenize(text)) {
    v[hashToken(tok) % dimension] += 1;
  }
  return v;
}

export function l2Norm(v: number[]): number {
  let sum = 0;
  for (const x of v) sum += x * x;
  return Math.sqrt(sum);
}

// zero vectors stay zero
export function normalize(v: number[]): number[] {
  const n = l2Norm(v);
  return n === 0 ? [...v] : v.map(x => x / n);
}

export function dot(a: number[], b: number[]): number {
  let s = 0;
  for (let i = 0; i < a.length; i++) s += a[i] * b[i];
  return s;
}
