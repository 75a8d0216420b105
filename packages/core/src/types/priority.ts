export const Priority = {
  Low: 'low',
  Medium: 'medium',
  High: 'high',
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

/** Sort rank: low < medium < high */
export const PriorityRank: Record<Priority, number> = {
  [Priority.Low]: 1,
  [Priority.Medium]: 2,
  [Priority.High]: 3,
};

export const PRIORITIES: readonly Priority[] = [Priority.Low, Priority.Medium, Priority.High];
