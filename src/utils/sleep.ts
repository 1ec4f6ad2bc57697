// src/utils/sleep.ts

import type { Sleep } from '../core/http/types';

// setTimeout fires almost at once for anything longer
export const MAX_SLEEP_MS = 2 ** 31 - 1;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, Math.min(ms, MAX_SLEEP_MS)));
