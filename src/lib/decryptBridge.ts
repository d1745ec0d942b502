import type { DecryptedKey, KeyListing, RawKey, RawListing } from '../api/types'
import { DEFAULT_DECRYPT_TIMEOUT_MS } from './config'
import { logBrowserDebug } from './debugLog'

export type DecryptKind = 'list' | 'object'

type Credentials = {
	encryptionKey: string
	salt: string
}

export type DecryptRequest =
	| ({ id: number; kind: 'list'; keys: RawKey[] } & Credentials)
	| ({ id: number; kind: 'object'; payload: string } & Credentials)

export type DecryptSuccess =
	| { id: number; kind: 'list'; ok: true; keys: DecryptedKey[] }
	| { id: number; kind: 'object'; ok: true; text: string }

export type DecryptFailure = { id: number; kind: DecryptKind; ok: false; error: string }

export type DecryptResponse = DecryptSuccess | DecryptFailure

// Worker-shaped endpoint; a dedicated Worker satisfies it.
export interface DecryptPort {
	postMessage(message: DecryptRequest): void
	onmessage: ((event: MessageEvent<unknown>) => void) | null
}

export class DecryptError extends Error {
	kind: DecryptKind

	constructor(kind: DecryptKind, message: string) {
		super(message)
		this.name = 'DecryptError'
		this.kind = kind
	}
}

export class DecryptSupersededError extends Error {
	kind: DecryptKind

	constructor(kind: DecryptKind) {
		super(`${kind} decrypt superseded by a newer request`)
		this.name = 'DecryptSupersededError'
		this.kind = kind
	}
}

type PendingEntry = {
	kind: DecryptKind
	resolve: (resp: DecryptSuccess) => void
	reject: (err: Error) => void
	timeoutId: ReturnType<typeof setTimeout>
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null
}

function isDecryptedKey(value: unknown): value is DecryptedKey {
	return (
		isRecord(value) &&
		typeof value.encryptedKey === 'string' &&
		typeof value.path === 'string' &&
		typeof value.size === 'number' &&
		typeof value.lastModified === 'string'
	)
}

export function parseDecryptResponse(data: unknown): DecryptResponse | null {
	if (!isRecord(data) || typeof data.id !== 'number') return null
	const { id, kind } = data
	if (kind !== 'list' && kind !== 'object') return null
	if (data.ok === false) {
		return { id, kind, ok: false, error: typeof data.error === 'string' ? data.error : 'decrypt failed' }
	}
	if (data.ok !== true) return null
	if (kind === 'list') {
		const keys = data.keys
		if (!Array.isArray(keys) || !keys.every(isDecryptedKey)) return null
		return { id, kind, ok: true, keys }
	}
	if (typeof data.text !== 'string') return null
	return { id, kind, ok: true, text: data.text }
}

export function bytesToBase64(bytes: Uint8Array): string {
	let binary = ''
	const chunkSize = 0x8000
	for (let i = 0; i < bytes.length; i += chunkSize) {
		binary += String.fromCharCode(...bytes.subarray(i, i + chunkSize))
	}
	return btoa(binary)
}

/**
 * Correlates requests to the out-of-process decryptor with their replies.
 *
 * At most one request per kind is outstanding: issuing a new one rejects the
 * previous promise with {@link DecryptSupersededError}, and a reply that
 * arrives for it afterwards is dropped.
 */
export class DecryptBridge {
	private port: DecryptPort
	private timeoutMs: number
	private nextId = 1
	private pending = new Map<number, PendingEntry>()

	constructor(port: DecryptPort, opts: { timeoutMs?: number } = {}) {
		this.port = port
		this.timeoutMs = opts.timeoutMs ?? DEFAULT_DECRYPT_TIMEOUT_MS
		this.port.onmessage = (event) => this.handleMessage(event.data)
	}

	async decryptListing(raw: RawListing, encryptionKey: string, salt: string): Promise<KeyListing> {
		const resp = await this.send({ id: this.nextId++, kind: 'list', keys: raw.keys, encryptionKey, salt })
		if (resp.kind !== 'list') throw new DecryptError('list', 'unexpected response kind')
		if (resp.keys.length !== raw.keys.length) {
			throw new DecryptError('list', `partial listing: expected ${raw.keys.length} keys, got ${resp.keys.length}`)
		}
		return { keys: resp.keys, encryptionKey, salt }
	}

	async decryptObject(payload: string, encryptionKey: string, salt: string): Promise<string> {
		const resp = await this.send({ id: this.nextId++, kind: 'object', payload, encryptionKey, salt })
		if (resp.kind !== 'object') throw new DecryptError('object', 'unexpected response kind')
		return resp.text
	}

	dispose() {
		for (const [id, entry] of this.pending.entries()) {
			clearTimeout(entry.timeoutId)
			entry.reject(new DecryptError(entry.kind, 'decrypt bridge closed'))
			this.pending.delete(id)
		}
		this.port.onmessage = null
	}

	private supersede(kind: DecryptKind) {
		for (const [id, entry] of this.pending.entries()) {
			if (entry.kind !== kind) continue
			clearTimeout(entry.timeoutId)
			this.pending.delete(id)
			logBrowserDebug('debug', 'decrypt request superseded', { id, kind })
			entry.reject(new DecryptSupersededError(kind))
		}
	}

	private send(req: DecryptRequest): Promise<DecryptSuccess> {
		this.supersede(req.kind)
		return new Promise<DecryptSuccess>((resolve, reject) => {
			const timeoutId = setTimeout(() => {
				this.pending.delete(req.id)
				reject(new DecryptError(req.kind, `decrypt timed out after ${this.timeoutMs}ms`))
			}, this.timeoutMs)

			this.pending.set(req.id, { kind: req.kind, resolve, reject, timeoutId })
			try {
				this.port.postMessage(req)
			} catch (err) {
				clearTimeout(timeoutId)
				this.pending.delete(req.id)
				reject(new DecryptError(req.kind, `postMessage failed: ${err instanceof Error ? err.message : String(err)}`))
			}
		})
	}

	private handleMessage(data: unknown) {
		const resp = parseDecryptResponse(data)
		if (!resp) {
			logBrowserDebug('warn', 'malformed decrypt response dropped')
			return
		}
		const entry = this.pending.get(resp.id)
		if (!entry) {
			logBrowserDebug('debug', 'stale decrypt response dropped', { id: resp.id, kind: resp.kind })
			return
		}
		this.pending.delete(resp.id)
		clearTimeout(entry.timeoutId)
		if (resp.ok) entry.resolve(resp)
		else entry.reject(new DecryptError(resp.kind, resp.error))
	}
}
