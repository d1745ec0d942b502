import type { DecryptedKey, RawKey } from '../api/types'
import { logBrowserDebug } from '../lib/debugLog'
import type { DecryptRequest, DecryptResponse } from '../lib/decryptBridge'

// Name and body decryption for one crypt remote; the cipher lives elsewhere.
export interface Decryptor {
	decryptName(segment: string, encryptionKey: string, salt: string): Promise<string> | string
	decryptBody(payload: string, encryptionKey: string, salt: string): Promise<string> | string
}

export interface DecryptScope {
	postMessage(message: DecryptResponse): void
	onmessage: ((event: MessageEvent<unknown>) => void) | null
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null
}

function isRawKey(value: unknown): value is RawKey {
	return (
		isRecord(value) &&
		typeof value.key === 'string' &&
		typeof value.size === 'number' &&
		typeof value.lastModified === 'string'
	)
}

export function parseDecryptRequest(data: unknown): DecryptRequest | null {
	if (!isRecord(data) || typeof data.id !== 'number') return null
	const { id, encryptionKey, salt } = data
	if (typeof encryptionKey !== 'string' || typeof salt !== 'string') return null
	if (data.kind === 'list') {
		const keys = data.keys
		if (!Array.isArray(keys) || !keys.every(isRawKey)) return null
		return { id, kind: 'list', keys, encryptionKey, salt }
	}
	if (data.kind === 'object' && typeof data.payload === 'string') {
		return { id, kind: 'object', payload: data.payload, encryptionKey, salt }
	}
	return null
}

// Empty segments (leading, doubled or trailing slashes) stay empty.
export async function decryptPath(
	encrypted: string,
	decryptor: Decryptor,
	encryptionKey: string,
	salt: string,
): Promise<string> {
	const segments = await Promise.all(
		encrypted.split('/').map((segment) => (segment === '' ? '' : decryptor.decryptName(segment, encryptionKey, salt))),
	)
	return segments.join('/')
}

export async function handleDecryptRequest(req: DecryptRequest, decryptor: Decryptor): Promise<DecryptResponse> {
	try {
		if (req.kind === 'list') {
			const keys: DecryptedKey[] = await Promise.all(
				req.keys.map(async (raw) => ({
					encryptedKey: raw.key,
					path: await decryptPath(raw.key, decryptor, req.encryptionKey, req.salt),
					size: raw.size,
					lastModified: raw.lastModified,
				})),
			)
			return { id: req.id, kind: 'list', ok: true, keys }
		}
		const text = await decryptor.decryptBody(req.payload, req.encryptionKey, req.salt)
		return { id: req.id, kind: 'object', ok: true, text }
	} catch (err) {
		return {
			id: req.id,
			kind: req.kind,
			ok: false,
			error: err instanceof Error ? err.message : String(err),
		}
	}
}

// A reply that cannot be posted (e.g. not cloneable) is answered with an error instead.
function replyFailure(scope: DecryptScope, req: DecryptRequest, err: unknown) {
	const message = err instanceof Error ? err.message : String(err)
	try {
		scope.postMessage({ id: req.id, kind: req.kind, ok: false, error: `reply failed: ${message}` })
	} catch (postErr) {
		logBrowserDebug('warn', 'decrypt reply dropped', {
			id: req.id,
			error: postErr instanceof Error ? postErr.message : String(postErr),
		})
	}
}

/** Answers bridge requests on `scope` until the returned stop function runs. */
export function serveDecryptRequests(scope: DecryptScope, decryptor: Decryptor): () => void {
	scope.onmessage = (event) => {
		const req = parseDecryptRequest(event.data)
		if (!req) return
		void handleDecryptRequest(req, decryptor)
			.then((resp) => scope.postMessage(resp))
			.catch((err: unknown) => replyFailure(scope, req, err))
	}
	return () => {
		scope.onmessage = null
	}
}
