import type { IClock } from '@domain/interfaces/IClock';
import { setTimeout as delay } from 'node:timers/promises';

export const systemClock: IClock = {
  now: () => Date.now(),
  sleep: async (ms, signal) => {
    await delay(ms, undefined, { signal });
  },
};
