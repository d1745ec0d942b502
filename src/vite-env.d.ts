/// <reference types="vite/client" />

interface ImportMetaEnv {
	readonly VITE_LIST_MAX_KEYS?: string
	readonly VITE_LIST_FOLLOW_CONTINUATION?: string
	readonly VITE_LIST_MAX_PAGES?: string
	readonly VITE_DECRYPT_TIMEOUT_MS?: string
	readonly VITE_S3_MAX_ATTEMPTS?: string
}

interface ImportMeta {
	readonly env: ImportMetaEnv
}
