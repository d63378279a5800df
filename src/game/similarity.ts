/**
 * Ratcliff/Obershelp similarity: 2 * M / T, where M counts characters in
 * matching blocks (longest common substring first, then recursively on both
 * sides) and T is the combined length. Works on code points so that astral
 * characters count once.
 */
export const similarityRatio = (a: string, b: string): number => {
  const left = Array.from(a);
  const right = Array.from(b);
  const total = left.length + right.length;
  if (total === 0) return 1;

  return (2 * countMatches(left, 0, left.length, right, 0, right.length)) / total;
};

interface Block {
  leftStart: number;
  rightStart: number;
  size: number;
}

const longestCommonBlock = (
  left: string[], leftLo: number, leftHi: number,
  right: string[], rightLo: number, rightHi: number
): Block => {
  let best: Block = { leftStart: leftLo, rightStart: rightLo, size: 0 };
  // lengths[j] = length of the common run ending at left[i - 1], right[j - 1]
  let previous = new Array<number>(rightHi - rightLo + 1).fill(0);

  for (let i = leftLo; i < leftHi; i++) {
    const current = new Array<number>(rightHi - rightLo + 1).fill(0);
    for (let j = rightLo; j < rightHi; j++) {
      if (left[i] !== right[j]) continue;
      const run = previous[j - rightLo] + 1;
      current[j - rightLo + 1] = run;
      if (run > best.size) {
        best = { leftStart: i - run + 1, rightStart: j - run + 1, size: run };
      }
    }
    previous = current;
  }

  return best;
};

const countMatches = (
  left: string[], leftLo: number, leftHi: number,
  right: string[], rightLo: number, rightHi: number
): number => {
  if (leftLo >= leftHi || rightLo >= rightHi) return 0;

  const block = longestCommonBlock(left, leftLo, leftHi, right, rightLo, rightHi);
  if (block.size === 0) return 0;

  return block.size
    + countMatches(left, leftLo, block.leftStart, right, rightLo, block.rightStart)
    + countMatches(
      left, block.leftStart + block.size, leftHi,
      right, block.rightStart + block.size, rightHi
    );
};
