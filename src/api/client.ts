import { DEFAULT_LIST_MAX_KEYS, DEFAULT_LIST_MAX_PAGES } from '../lib/config'
import { logBrowserDebug } from '../lib/debugLog'
import type { Account, ObjectStore, RawKey, RawListing } from './types'

export class StorageError extends Error {
	status: number
	code: string
	retryable: boolean

	constructor(args: { status: number; code: string; message: string; retryable?: boolean }) {
		super(args.message)
		this.name = 'StorageError'
		this.status = args.status
		this.code = args.code
		this.retryable = args.retryable ?? false
	}
}

// Chrome, Firefox, Safari and undici wording respectively.
const FETCH_FAILURE = /failed to fetch|networkerror|load failed|fetch failed/i

export function toStorageError(err: unknown): StorageError {
	if (err instanceof StorageError) return err
	// fetch() throws TypeError for DNS, CORS and offline failures.
	if (err instanceof TypeError && FETCH_FAILURE.test(err.message)) {
		return new StorageError({ status: 0, code: 'network_error', message: err.message || 'network error', retryable: true })
	}
	if (err instanceof Error) {
		return new StorageError({ status: 0, code: 'storage_error', message: err.message || err.name })
	}
	return new StorageError({ status: 0, code: 'storage_error', message: 'unknown error' })
}

export type ListBucketOptions = {
	maxKeys?: number
	followContinuation?: boolean
	maxPages?: number
}

export type StoreFactory = (account: Account) => ObjectStore

function firstBucket(account: Account): string {
	const bucket = account.buckets[0]?.trim()
	if (!bucket) {
		throw new StorageError({ status: 0, code: 'no_bucket', message: 'account has no bucket configured' })
	}
	return bucket
}

export class StorageClient {
	private createStore: StoreFactory
	private listDefaults: Required<ListBucketOptions>
	private stores = new WeakMap<Account, ObjectStore>()

	constructor(args: { createStore: StoreFactory; listing?: ListBucketOptions }) {
		this.createStore = args.createStore
		this.listDefaults = {
			maxKeys: args.listing?.maxKeys ?? DEFAULT_LIST_MAX_KEYS,
			followContinuation: args.listing?.followContinuation ?? false,
			maxPages: args.listing?.maxPages ?? DEFAULT_LIST_MAX_PAGES,
		}
	}

	private storeFor(account: Account): ObjectStore {
		const cached = this.stores.get(account)
		if (cached) return cached
		const store = this.createStore(account)
		this.stores.set(account, store)
		return store
	}

	private async call<T>(op: string, fn: () => Promise<T>): Promise<T> {
		try {
			return await fn()
		} catch (err) {
			const storageErr = toStorageError(err)
			logBrowserDebug('warn', `${op} failed`, { code: storageErr.code, status: storageErr.status })
			throw storageErr
		}
	}

	// Without followContinuation only the first page is fetched and isTruncated reports the cut.
	listBucket(account: Account, options: ListBucketOptions = {}, signal?: AbortSignal): Promise<RawListing> {
		const { maxKeys, followContinuation, maxPages } = { ...this.listDefaults, ...options }
		return this.call('listBucket', async () => {
			const bucket = firstBucket(account)
			const store = this.storeFor(account)
			const keys: RawKey[] = []
			let continuationToken: string | undefined
			for (let page = 1; ; page++) {
				signal?.throwIfAborted()
				const resp = await store.listObjects({ bucket, maxKeys, continuationToken }, { signal })
				keys.push(...resp.keys)
				if (!resp.isTruncated || !resp.nextContinuationToken) {
					return { keys, isTruncated: resp.isTruncated }
				}
				if (!followContinuation || page >= maxPages) {
					return { keys, isTruncated: true }
				}
				continuationToken = resp.nextContinuationToken
			}
		})
	}

	deleteObject(account: Account, encryptedKey: string): Promise<string> {
		return this.call('deleteObject', async () => {
			await this.storeFor(account).deleteObject({ bucket: firstBucket(account), key: encryptedKey })
			return `Deleted ${encryptedKey}`
		})
	}

	getObjectBytes(account: Account, encryptedKey: string): Promise<Uint8Array> {
		return this.call('getObjectBytes', () =>
			this.storeFor(account).getObject({ bucket: firstBucket(account), key: encryptedKey }),
		)
	}
}
