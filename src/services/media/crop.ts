import { ImageDifficulty } from '../../game/options';

export interface CropRegion {
  left: number;
  top: number;
  width: number;
  height: number;
}

/** Fraction of each side kept: 0.5 leaves 25% of the area, 0.316 about 10% */
const SIDE_FRACTION: Record<ImageDifficulty, number> = {
  easy: 1,
  medium: 0.5,
  hard: 0.316
};

const randomInt = (min: number, max: number, random: () => number): number =>
  min + Math.floor(random() * (max - min + 1));

/**
 * Picks the visible part of a cover. The origin is uniform over every
 * position where the crop still fits, so the informative region moves.
 */
export const computeCropRegion = (
  width: number,
  height: number,
  difficulty: ImageDifficulty,
  random: () => number = Math.random
): CropRegion => {
  if (difficulty === 'easy') {
    return { left: 0, top: 0, width, height };
  }

  const fraction = SIDE_FRACTION[difficulty];
  const cropWidth = Math.max(1, Math.floor(width * fraction));
  const cropHeight = Math.max(1, Math.floor(height * fraction));

  return {
    left: randomInt(0, width - cropWidth, random),
    top: randomInt(0, height - cropHeight, random),
    width: cropWidth,
    height: cropHeight
  };
};
