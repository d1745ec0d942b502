const DEBUG_BROWSER_KEY = 'debugCryptBrowser'
const PERF_KEY = 'cryptBrowserPerf'

type LogContext = Record<string, unknown>

function readFlag(key: string): boolean {
	if (typeof window === 'undefined') return false
	try {
		const v = window.localStorage.getItem(key)
		return v === 'true' || v === '1'
	} catch {
		return false
	}
}

export function isBrowserDebugEnabled(): boolean {
	return readFlag(DEBUG_BROWSER_KEY)
}

export function logBrowserDebug(level: 'debug' | 'warn', message: string, context?: LogContext): void {
	if (!isBrowserDebugEnabled()) return
	const prefix = `[browser] ${message}`
	if (level === 'warn') {
		if (context) console.warn(prefix, context)
		else console.warn(prefix)
		return
	}
	if (context) console.debug(prefix, context)
	else console.debug(prefix)
}

const formatMeta = (meta?: LogContext): string => {
	if (!meta) return ''
	try {
		return ` ${JSON.stringify(meta)}`
	} catch {
		return ''
	}
}

export const measurePerf = <T>(label: string, fn: () => T, meta?: LogContext): T => {
	if (!readFlag(PERF_KEY)) return fn()
	const start = performance.now()
	const result = fn()
	const duration = performance.now() - start
	console.debug(`[perf] ${label} ${duration.toFixed(1)}ms${formatMeta(meta)}`)
	return result
}
