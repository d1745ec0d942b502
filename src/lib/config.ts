export const DEFAULT_LIST_MAX_KEYS = 100
export const DEFAULT_LIST_MAX_PAGES = 50
export const DEFAULT_DECRYPT_TIMEOUT_MS = 30_000
export const DEFAULT_S3_MAX_ATTEMPTS = 3

export type BrowserConfig = {
	listMaxKeys: number
	listFollowContinuation: boolean
	listMaxPages: number
	decryptTimeoutMs: number
	s3MaxAttempts: number
}

type EnvSource = Record<string, unknown>

export function clampNumber(value: number, min: number, max: number): number {
	if (!Number.isFinite(value)) return min
	if (max < min) return min
	return Math.max(min, Math.min(max, value))
}

function readInt(env: EnvSource, name: string, fallback: number, min: number, max: number): number {
	const raw = env[name]
	if (typeof raw !== 'string' || !raw.trim()) return fallback
	const parsed = Number.parseInt(raw.trim(), 10)
	if (Number.isNaN(parsed)) return fallback
	return clampNumber(parsed, min, max)
}

function readBool(env: EnvSource, name: string, fallback: boolean): boolean {
	const raw = env[name]
	if (typeof raw !== 'string') return fallback
	const v = raw.trim().toLowerCase()
	if (v === 'true' || v === '1') return true
	if (v === 'false' || v === '0') return false
	return fallback
}

export function readBrowserConfig(env: EnvSource): BrowserConfig {
	return {
		// S3 never returns more than 1000 keys per page.
		listMaxKeys: readInt(env, 'VITE_LIST_MAX_KEYS', DEFAULT_LIST_MAX_KEYS, 1, 1000),
		listFollowContinuation: readBool(env, 'VITE_LIST_FOLLOW_CONTINUATION', false),
		listMaxPages: readInt(env, 'VITE_LIST_MAX_PAGES', DEFAULT_LIST_MAX_PAGES, 1, 10_000),
		decryptTimeoutMs: readInt(env, 'VITE_DECRYPT_TIMEOUT_MS', DEFAULT_DECRYPT_TIMEOUT_MS, 1000, 600_000),
		s3MaxAttempts: readInt(env, 'VITE_S3_MAX_ATTEMPTS', DEFAULT_S3_MAX_ATTEMPTS, 1, 10),
	}
}

export function getBrowserConfig(): BrowserConfig {
	return readBrowserConfig(import.meta.env)
}
