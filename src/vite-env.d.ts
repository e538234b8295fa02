/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_SWAP_DELAY_MS?: string;
  readonly VITE_RANDOM_SEED?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
