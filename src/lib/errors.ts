import { StorageError } from '../api/client'
import { DecryptError } from './decryptBridge'

export type ErrorDetails = {
	title: string
	hint?: string
}

export function formatError(err: unknown): string {
	if (err instanceof StorageError) {
		const status = err.status > 0 ? ` (HTTP ${err.status})` : ''
		return `${err.code}: ${err.message}${status}`
	}
	if (err instanceof DecryptError) return `Decrypt failed: ${err.message}`
	if (err instanceof Error) return err.message
	return 'unknown error'
}

export function getRecoveryHint(err: unknown): string | undefined {
	if (!(err instanceof StorageError)) return undefined

	switch (err.code) {
		case 'InvalidAccessKeyId':
			return 'Invalid access key. Sign out and check the access key for this account.'
		case 'SignatureDoesNotMatch':
			return 'Signature mismatch. Common causes: wrong secret key, wrong region, or the wrong provider selected.'
		case 'NoSuchBucket':
			return 'Bucket not found. Check the bucket name and region.'
		case 'NoSuchKey':
			return 'Object not found. It may have been deleted; refresh the listing.'
		case 'AccessDenied':
			return 'Access denied. Check the bucket policy and whether the keys can read this bucket.'
		case 'RequestTimeTooSkewed':
			return 'Request time skewed. Check the system clock and try again.'
		case 'no_bucket':
			return 'No bucket configured. Sign out and sign in again with a bucket name.'
		case 'network_error':
			return 'Network error. Check connectivity and the bucket CORS configuration.'
	}
	if (err.status >= 500 || err.retryable) {
		return 'Temporary provider error. Retry after a short delay.'
	}
	return undefined
}

export function describeError(err: unknown): ErrorDetails {
	const title = formatError(err)
	const hint = getRecoveryHint(err)
	return hint ? { title, hint } : { title }
}

export function formatErrorWithHint(err: unknown): string {
	const details = describeError(err)
	return details.hint ? `${details.title} · Recommended action: ${details.hint}` : details.title
}
