import type { Account, KeyListing, Session } from '../api/types'
import { logBrowserDebug } from './debugLog'

export const SESSION_STORAGE_KEY = 'cryptBucketSession'

export const EMPTY_SESSION: Session = { account: null, encryptionKey: '', salt: '' }

export type SignedInSession = Session & { account: Account }

export type PersistedSession =
	| Record<string, never>
	| {
			account: Account
			encryptionKey: string
			salt: string
	  }

export type KeyValueStorage = Pick<Storage, 'getItem' | 'setItem'>

export type CredentialStore = {
	restore(): Session
	signIn(account: Account, encryptionKey: string, salt: string): void
	signOut(): void
}

export function isSignedIn(session: Session): session is SignedInSession {
	return session.account !== null
}

export function storageToJson(session: Session): PersistedSession {
	if (!isSignedIn(session)) return {}
	return {
		account: { ...session.account, buckets: [...session.account.buckets] },
		encryptionKey: session.encryptionKey,
		salt: session.salt,
	}
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isNonEmptyString(value: unknown): value is string {
	return typeof value === 'string' && value.length > 0
}

function accountFromJson(value: unknown): Account | null {
	if (!isRecord(value)) return null
	const { endpoint, region, isDigitalOcean, accessKey, secretKey, buckets } = value
	if (endpoint !== 'amazon-s3') return null
	if (region !== undefined && typeof region !== 'string') return null
	if (typeof isDigitalOcean !== 'boolean') return null
	if (!isNonEmptyString(accessKey) || !isNonEmptyString(secretKey)) return null
	if (!Array.isArray(buckets) || buckets.length === 0) return null
	if (!buckets.every((b): b is string => typeof b === 'string')) return null
	const account: Account = { endpoint, isDigitalOcean, accessKey, secretKey, buckets: [...buckets] }
	if (region !== undefined) account.region = region
	return account
}

// Any payload that is not a complete signed-in session reads as signed out.
export function storageFromJson(value: unknown): Session {
	if (!isRecord(value)) return EMPTY_SESSION
	const account = accountFromJson(value.account)
	if (!account) return EMPTY_SESSION
	const { encryptionKey, salt } = value
	if (!isNonEmptyString(encryptionKey) || !isNonEmptyString(salt)) return EMPTY_SESSION
	return { account, encryptionKey, salt }
}

function defaultStorage(): KeyValueStorage | null {
	if (typeof window === 'undefined') return null
	try {
		return window.localStorage
	} catch {
		return null
	}
}

export function createCredentialStore(
	storage: KeyValueStorage | null = defaultStorage(),
	key: string = SESSION_STORAGE_KEY,
): CredentialStore {
	const persist = (session: Session) => {
		if (!storage) return
		try {
			storage.setItem(key, JSON.stringify(storageToJson(session)))
		} catch (err) {
			logBrowserDebug('warn', 'session not persisted', { error: err instanceof Error ? err.message : String(err) })
		}
	}

	return {
		restore() {
			if (!storage) return EMPTY_SESSION
			try {
				const raw = storage.getItem(key)
				if (raw === null) return EMPTY_SESSION
				return storageFromJson(JSON.parse(raw))
			} catch {
				return EMPTY_SESSION
			}
		},
		signIn(account, encryptionKey, salt) {
			persist({ account, encryptionKey, salt })
		},
		signOut() {
			persist(EMPTY_SESSION)
		},
	}
}

export type SignInForm = {
	accessKey: string
	secretKey: string
	region: string
	isDigitalOcean: boolean
	bucket: string
	encryptionKey: string
	salt: string
}

type RequiredField = 'accessKey' | 'secretKey' | 'bucket' | 'encryptionKey' | 'salt'

export type SignInResult =
	| { ok: true; session: SignedInSession }
	| { ok: false; field: RequiredField; status: string }

const REQUIRED_FIELDS: Array<[RequiredField, string]> = [
	['accessKey', 'Access key'],
	['secretKey', 'Secret key'],
	['bucket', 'Bucket'],
	['encryptionKey', 'Encryption key'],
	['salt', 'Salt'],
]

export function validateSignIn(form: SignInForm): SignInResult {
	for (const [field, label] of REQUIRED_FIELDS) {
		if (!form[field].trim()) return { ok: false, field, status: `${label} is required` }
	}
	const account: Account = {
		endpoint: 'amazon-s3',
		isDigitalOcean: form.isDigitalOcean,
		accessKey: form.accessKey.trim(),
		secretKey: form.secretKey.trim(),
		buckets: [form.bucket.trim()],
	}
	const region = form.region.trim()
	if (region) account.region = region
	// Keys are used verbatim: surrounding whitespace may be part of the passphrase.
	return { ok: true, session: { account, encryptionKey: form.encryptionKey, salt: form.salt } }
}

export function isListingForSession(listing: KeyListing, session: Session): boolean {
	if (!isSignedIn(session)) return false
	return listing.encryptionKey === session.encryptionKey && listing.salt === session.salt
}
