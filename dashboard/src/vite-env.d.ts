/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_PROTEIN_DATA_URL?: string;
  readonly VITE_FOOD_SECURITY_DATA_URL?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
