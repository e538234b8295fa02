export const VALUE_MIN = 1;
export const VALUE_MAX = 1000;

// Values at or below this are clickable reseed triggers.
export const RESEED_THRESHOLD = 30;

export const SWAP_DELAY_MS = 100;

// Keeps the grid renderable; the form rejects anything larger.
export const MAX_COUNT = 2000;
