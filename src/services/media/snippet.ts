export interface SnippetWindow {
  startSeconds: number;
  durationSeconds: number;
  /** True when the source is used whole because it is not longer than the snippet */
  wholeSource: boolean;
}

export const computeSnippetWindow = (
  sourceDurationSeconds: number,
  snippetLengthSeconds: number,
  random: () => number = Math.random
): SnippetWindow => {
  if (sourceDurationSeconds <= snippetLengthSeconds) {
    return { startSeconds: 0, durationSeconds: sourceDurationSeconds, wholeSource: true };
  }

  const maxStart = sourceDurationSeconds - snippetLengthSeconds;
  return {
    startSeconds: random() * maxStart,
    durationSeconds: snippetLengthSeconds,
    wholeSource: false
  };
};
