export const INJECTION_TOKENS = {
  CLOCK: 'CLOCK',
} as const;
