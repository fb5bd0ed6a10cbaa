export const Priority = {
  High: 'High',
  Medium: 'Medium',
  Low: 'Low',
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

export const PRIORITIES: readonly Priority[] = [Priority.High, Priority.Medium, Priority.Low];

/** Sort rank for display: lower comes first */
export const PriorityRank: Record<Priority, number> = {
  [Priority.High]: 0,
  [Priority.Medium]: 1,
  [Priority.Low]: 2,
};

export function isPriority(value: string): value is Priority {
  return (PRIORITIES as readonly string[]).includes(value);
}
