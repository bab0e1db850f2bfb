export const XP_PER_LEVEL = 500;

// level 1 covers 0–499, level 2 covers 500–999, ...
export const levelFor = (xp: number): number => Math.floor(xp / XP_PER_LEVEL) + 1;

export const xpToNextLevel = (xp: number, level: number = levelFor(xp)): number =>
  level * XP_PER_LEVEL - xp;

export const progressToNextLevel = (xp: number, level: number = levelFor(xp)): number =>
  (xp - (level - 1) * XP_PER_LEVEL) / XP_PER_LEVEL;

export interface LevelProgress {
  level: number;
  xpToNextLevel: number;
  progressToNextLevel: number;
}

export const describeProgress = (xp: number): LevelProgress => {
  const level = levelFor(xp);
  return {
    level,
    xpToNextLevel: xpToNextLevel(xp, level),
    progressToNextLevel: progressToNextLevel(xp, level),
  };
};
