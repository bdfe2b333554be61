export const Priority = {
  High: 'High',
  Medium: 'Medium',
  Low: 'Low',
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];
