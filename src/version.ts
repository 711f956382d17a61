export const ROOTFINDER_VERSION = {
  major: 1,
  minor: 0,
  patch: 0,
  string: '1.0.0',
} as const;
