export { StorageClient, StorageError, toStorageError } from './api/client'
export type { ListBucketOptions, StoreFactory } from './api/client'
export { S3ObjectStore, createS3Client, createS3ObjectStore, resolveEndpoint, resolveRegion } from './api/s3Store'
export type * from './api/types'
export { getBrowserConfig, readBrowserConfig } from './lib/config'
export type { BrowserConfig } from './lib/config'
export { DecryptBridge, DecryptError, DecryptSupersededError, bytesToBase64 } from './lib/decryptBridge'
export type { DecryptPort, DecryptRequest, DecryptResponse } from './lib/decryptBridge'
export { describeError, formatError, formatErrorWithHint, getRecoveryHint } from './lib/errors'
export * from './lib/fileTree'
export { saveTextFile } from './lib/saveFile'
export {
	EMPTY_SESSION,
	createCredentialStore,
	isListingForSession,
	isSignedIn,
	storageFromJson,
	storageToJson,
	validateSignIn,
} from './lib/session'
export type { CredentialStore, SignInForm, SignInResult } from './lib/session'
export { useSession } from './lib/useSession'
export { browserReducer, initialBrowserState } from './pages/browser/browserState'
export type { BrowserAction, BrowserState } from './pages/browser/browserState'
export { createBrowserServices } from './pages/browser/services'
export { useBrowser } from './pages/browser/useBrowser'
export { serveDecryptRequests } from './workers/decryptWorker'
export type { DecryptScope, Decryptor } from './workers/decryptWorker'
