// Environment variables

import { SWAP_DELAY_MS as DEFAULT_SWAP_DELAY_MS } from "@/components/sorter/engine/constants";

function readNumber(raw: string | undefined, fallback: number) {
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
}

// Pause after every swap while animating, in ms.
export const SWAP_DELAY_MS = readNumber(import.meta.env.VITE_SWAP_DELAY_MS, DEFAULT_SWAP_DELAY_MS);

// Set to make every generated grid reproducible.
export const RANDOM_SEED: number | undefined = import.meta.env.VITE_RANDOM_SEED
  ? readNumber(import.meta.env.VITE_RANDOM_SEED, 0)
  : undefined;
