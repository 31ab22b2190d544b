export type DiffEvent =
  | { kind: "equal"; oldLine: string; newLine: string }
  | { kind: "delete"; oldLine: string }
  | { kind: "insert"; newLine: string }
  | { kind: "replace"; oldLine: string; newLine: string };

/**
 * For each index of `a`, the index of the `b` element it is matched with in a
 * longest common subsequence, or undefined.
 */
export function lcsMatches(a: string[], b: string[]): Array<number | undefined> {
  // lengths[i][j] = LCS length of a[i..] and b[j..]
  const lengths: number[][] = Array.from({ length: a.length + 1 }, () =>
    new Array<number>(b.length + 1).fill(0)
  );
  for (let i = a.length - 1; i >= 0; i--) {
    for (let j = b.length - 1; j >= 0; j--) {
      lengths[i][j] =
        a[i] === b[j]
          ? lengths[i + 1][j + 1] + 1
          : Math.max(lengths[i + 1][j], lengths[i][j + 1]);
    }
  }

  const matches: Array<number | undefined> = new Array(a.length).fill(undefined);
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    if (a[i] === b[j]) {
      matches[i] = j;
      i++;
      j++;
    } else if (lengths[i + 1][j] >= lengths[i][j + 1]) {
      i++;
    } else {
      j++;
    }
  }
  return matches;
}

/**
 * Line diff with balanced traversal: between two matched lines, unmatched
 * lines are paired up as replacements while both sides have some left, then
 * the leftover old lines are deletions and the leftover new lines insertions.
 */
export function diffLines(a: string[], b: string[]): DiffEvent[] {
  const matches = lcsMatches(a, b);
  const events: DiffEvent[] = [];
  let ai = 0;
  let bj = 0;

  const drainUntil = (aEnd: number, bEnd: number) => {
    while (ai < aEnd || bj < bEnd) {
      if (ai < aEnd && bj < bEnd) {
        events.push({ kind: "replace", oldLine: a[ai], newLine: b[bj] });
        ai++;
        bj++;
      } else if (ai < aEnd) {
        events.push({ kind: "delete", oldLine: a[ai] });
        ai++;
      } else {
        events.push({ kind: "insert", newLine: b[bj] });
        bj++;
      }
    }
  };

  matches.forEach((mb, ma) => {
    if (mb === undefined) return;
    drainUntil(ma, mb);
    events.push({ kind: "equal", oldLine: a[ai], newLine: b[bj] });
    ai++;
    bj++;
  });
  drainUntil(a.length, b.length);

  return events;
}
