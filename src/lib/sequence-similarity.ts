/**
 * Ratcliff/Obershelp string similarity.
 *
 * Finds the longest common block (earliest in `a`, then earliest in `b` on
 * ties), recurses on the pieces to its left and right, and scores
 * 2 * matched / (|a| + |b|).
 */

interface Block {
  i: number;
  j: number;
  size: number;
}

function indexPositions(b: string): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const ch = b[j];
    const list = positions.get(ch);
    if (list) {
      list.push(j);
    } else {
      positions.set(ch, [j]);
    }
  }
  return positions;
}

function longestMatch(
  a: string,
  positions: Map<string, number[]>,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number
): Block {
  let best: Block = { i: aLo, j: bLo, size: 0 };
  // run length of the match ending at (i - 1, j)
  let lengths = new Map<number, number>();

  for (let i = aLo; i < aHi; i++) {
    const next = new Map<number, number>();
    for (const j of positions.get(a[i]) ?? []) {
      if (j < bLo) continue;
      if (j >= bHi) break;
      const k = (lengths.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > best.size) {
        best = { i: i - k + 1, j: j - k + 1, size: k };
      }
    }
    lengths = next;
  }
  return best;
}

export function matchingCharacters(a: string, b: string): number {
  const positions = indexPositions(b);
  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  let matched = 0;

  while (pending.length > 0) {
    const range = pending.pop();
    if (!range) break;
    const [aLo, aHi, bLo, bHi] = range;
    const block = longestMatch(a, positions, aLo, aHi, bLo, bHi);
    if (block.size === 0) continue;

    matched += block.size;
    if (aLo < block.i && bLo < block.j) {
      pending.push([aLo, block.i, bLo, block.j]);
    }
    if (block.i + block.size < aHi && block.j + block.size < bHi) {
      pending.push([block.i + block.size, aHi, block.j + block.size, bHi]);
    }
  }
  return matched;
}

export function sequenceRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * matchingCharacters(a, b)) / total;
}
