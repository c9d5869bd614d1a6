/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_API_BASE_URL?: string;
  readonly VITE_TRANSLATION_ENABLED?: string;
  readonly VITE_MAX_CHUNK_CHARS?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
