const RUN_PATTERN = /\d+|\D+/g;
const DIGITS = /^\d/;

/**
 * Split a string into maximal runs of digits and non-digits
 */
export function splitRuns(value: string): string[] {
  return value.match(RUN_PATTERN) ?? [];
}

function compareDigitRuns(a: string, b: string): number {
  // Compare by magnitude without converting, so long runs keep their precision
  const trimmedA = a.replace(/^0+(?=\d)/, '');
  const trimmedB = b.replace(/^0+(?=\d)/, '');
  if (trimmedA.length !== trimmedB.length) {
    return trimmedA.length - trimmedB.length;
  }
  if (trimmedA === trimmedB) {
    return 0;
  }
  return trimmedA < trimmedB ? -1 : 1;
}

function compareTextRuns(a: string, b: string): number {
  const lowerA = a.toLowerCase();
  const lowerB = b.toLowerCase();
  if (lowerA === lowerB) {
    return 0;
  }
  return lowerA < lowerB ? -1 : 1;
}

/**
 * Natural-order comparator for file names.
 *
 * Digit runs compare as integers and text runs case-insensitively, so
 * `img2.jpg` sorts before `img10.jpg`. A digit run sorts before a text run
 * at the same position. Names that compare equal run for run (`a.jpg` and
 * `A.jpg`) fall back to code-unit order to keep the sort stable across
 * platforms.
 */
export function naturalCompare(a: string, b: string): number {
  const runsA = splitRuns(a);
  const runsB = splitRuns(b);
  const shared = Math.min(runsA.length, runsB.length);

  for (let i = 0; i < shared; i++) {
    const runA = runsA[i];
    const runB = runsB[i];
    const digitsA = DIGITS.test(runA);
    const digitsB = DIGITS.test(runB);

    let result: number;
    if (digitsA && digitsB) {
      result = compareDigitRuns(runA, runB);
    } else if (digitsA !== digitsB) {
      result = digitsA ? -1 : 1;
    } else {
      result = compareTextRuns(runA, runB);
    }

    if (result !== 0) {
      return result;
    }
  }

  if (runsA.length !== runsB.length) {
    return runsA.length - runsB.length;
  }

  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

export function naturalSort(names: Iterable<string>): string[] {
  return [...names].sort(naturalCompare);
}
