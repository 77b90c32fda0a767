export const MODES = ['full', 'test', 'deep'] as const;

export type Mode = (typeof MODES)[number];

export interface ModeProfile {
  /** Keep only the first N keywords; undefined keeps them all. */
  keywordLimit?: number;
  pagesPerKeyword: number;
  /** Run the cross-platform analytics pass after the run. */
  analytics: boolean;
}

export const MODE_PROFILES: Record<Mode, ModeProfile> = {
  test: { keywordLimit: 3, pagesPerKeyword: 2, analytics: false },
  full: { pagesPerKeyword: 5, analytics: false },
  deep: { pagesPerKeyword: 10, analytics: true },
};

export function parseMode(value: string): Mode {
  const mode = MODES.find((m) => m === value.trim().toLowerCase());
  if (!mode) {
    throw new Error(`Unknown mode "${value}". Expected one of: ${MODES.join(', ')}`);
  }
  return mode;
}
