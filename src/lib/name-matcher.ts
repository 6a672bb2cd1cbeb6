const PARENTHETICAL = /\s*\([^)]*\)\s*/g;
const PLATFORM_SUFFIX = /\s*-\s*(zoom|teams|webex|google meet)\b.*$/i;

export function normalizeName(name: string): string {
  return name
    .toLowerCase()
    .replace(PARENTHETICAL, " ")
    .replace(PLATFORM_SUFFIX, "")
    .split(/\s+/)
    .filter(Boolean)
    .join(" ");
}

interface MatchBlock {
  a: number;
  b: number;
  size: number;
}

function buildIndex(b: string): Map<string, number[]> {
  const index = new Map<string, number[]>();
  for (let j = 0; j < b.length; j += 1) {
    const positions = index.get(b[j]);
    if (positions) {
      positions.push(j);
    } else {
      index.set(b[j], [j]);
    }
  }

  return index;
}

function longestMatch(
  a: string,
  b: string,
  index: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): MatchBlock {
  let bestA = alo;
  let bestB = blo;
  let bestSize = 0;
  let runLengths = new Map<number, number>();

  for (let i = alo; i < ahi; i += 1) {
    const next = new Map<number, number>();
    for (const j of index.get(a[i]) ?? []) {
      if (j < blo) {
        continue;
      }
      if (j >= bhi) {
        break;
      }

      const size = (runLengths.get(j - 1) ?? 0) + 1;
      next.set(j, size);
      if (size > bestSize) {
        bestA = i - size + 1;
        bestB = j - size + 1;
        bestSize = size;
      }
    }
    runLengths = next;
  }

  while (bestA > alo && bestB > blo && a[bestA - 1] === b[bestB - 1]) {
    bestA -= 1;
    bestB -= 1;
    bestSize += 1;
  }

  while (bestA + bestSize < ahi && bestB + bestSize < bhi && a[bestA + bestSize] === b[bestB + bestSize]) {
    bestSize += 1;
  }

  return { a: bestA, b: bestB, size: bestSize };
}

function matchedCharacters(a: string, b: string): number {
  const index = buildIndex(b);
  const queue: [number, number, number, number][] = [[0, a.length, 0, b.length]];
  let total = 0;

  while (queue.length > 0) {
    const next = queue.pop();
    if (!next) {
      break;
    }

    const [alo, ahi, blo, bhi] = next;
    const block = longestMatch(a, b, index, alo, ahi, blo, bhi);
    if (block.size === 0) {
      continue;
    }

    total += block.size;
    if (alo < block.a && blo < block.b) {
      queue.push([alo, block.a, blo, block.b]);
    }
    if (block.a + block.size < ahi && block.b + block.size < bhi) {
      queue.push([block.a + block.size, ahi, block.b + block.size, bhi]);
    }
  }

  return total;
}

/**
 * Ratcliff/Obershelp similarity: twice the matched characters over the combined length.
 * Tie-breaking inside the block search depends on argument order, so both orders are
 * scored and the larger ratio wins.
 */
export function sequenceRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) {
    return 1;
  }

  const matched = Math.max(matchedCharacters(a, b), matchedCharacters(b, a));
  return (2 * matched) / total;
}

export function nameSimilarity(nameA: string, nameB: string): number {
  const a = normalizeName(nameA);
  const b = normalizeName(nameB);

  if (!a || !b) {
    return 0;
  }

  if (a === b) {
    return 1;
  }

  return sequenceRatio(a, b);
}
