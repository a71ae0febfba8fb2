/// <reference types="vite/client" />

interface ImportMetaEnv {
    readonly VITE_DATA_API_URL?: string;
    readonly VITE_FETCH_TIMEOUT_MS?: string;
}

interface ImportMeta {
    readonly env: ImportMetaEnv;
}
