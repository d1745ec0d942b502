import {
	DeleteObjectCommand,
	GetObjectCommand,
	ListObjectsV2Command,
	S3Client,
	S3ServiceException,
} from '@aws-sdk/client-s3'

import { DEFAULT_S3_MAX_ATTEMPTS } from '../lib/config'
import { StorageError } from './client'
import type {
	Account,
	ListObjectsPage,
	ListObjectsRequest,
	ObjectRequest,
	ObjectStore,
	RawKey,
	RequestOptions,
} from './types'

export const DEFAULT_AWS_REGION = 'us-east-1'
export const DEFAULT_SPACES_REGION = 'nyc3'

export type S3Sender = Pick<S3Client, 'send'>

export function resolveRegion(account: Account): string {
	const region = account.region?.trim()
	if (region) return region
	return account.isDigitalOcean ? DEFAULT_SPACES_REGION : DEFAULT_AWS_REGION
}

export function resolveEndpoint(account: Account): string | undefined {
	if (!account.isDigitalOcean) return undefined
	return `https://${resolveRegion(account)}.digitaloceanspaces.com`
}

export function createS3Client(account: Account, opts: { maxAttempts?: number } = {}): S3Client {
	return new S3Client({
		region: resolveRegion(account),
		endpoint: resolveEndpoint(account),
		credentials: {
			accessKeyId: account.accessKey,
			secretAccessKey: account.secretKey,
		},
		maxAttempts: opts.maxAttempts ?? DEFAULT_S3_MAX_ATTEMPTS,
	})
}

function fromS3Exception(err: S3ServiceException): StorageError {
	return new StorageError({
		status: err.$metadata.httpStatusCode ?? 0,
		code: err.name,
		message: err.message || err.name,
		retryable: err.$fault === 'server' || err.$retryable !== undefined,
	})
}

async function translateErrors<T>(fn: () => Promise<T>): Promise<T> {
	try {
		return await fn()
	} catch (err) {
		if (err instanceof S3ServiceException) throw fromS3Exception(err)
		throw err
	}
}

export class S3ObjectStore implements ObjectStore {
	private client: S3Sender

	constructor(client: S3Sender) {
		this.client = client
	}

	listObjects(req: ListObjectsRequest, opts: RequestOptions = {}): Promise<ListObjectsPage> {
		return translateErrors(async () => {
			const resp = await this.client.send(
				new ListObjectsV2Command({
					Bucket: req.bucket,
					MaxKeys: req.maxKeys,
					ContinuationToken: req.continuationToken,
				}),
				{ abortSignal: opts.signal },
			)
			const keys: RawKey[] = []
			for (const item of resp.Contents ?? []) {
				if (!item.Key) continue
				keys.push({
					key: item.Key,
					size: item.Size ?? 0,
					lastModified: item.LastModified ? item.LastModified.toISOString() : '',
				})
			}
			return {
				keys,
				isTruncated: resp.IsTruncated ?? false,
				nextContinuationToken: resp.NextContinuationToken,
			}
		})
	}

	getObject(req: ObjectRequest): Promise<Uint8Array> {
		return translateErrors(async () => {
			const resp = await this.client.send(new GetObjectCommand({ Bucket: req.bucket, Key: req.key }))
			if (!resp.Body) return new Uint8Array()
			return resp.Body.transformToByteArray()
		})
	}

	deleteObject(req: ObjectRequest): Promise<void> {
		return translateErrors(async () => {
			await this.client.send(new DeleteObjectCommand({ Bucket: req.bucket, Key: req.key }))
		})
	}
}

export function createS3ObjectStore(account: Account, opts: { maxAttempts?: number } = {}): ObjectStore {
	return new S3ObjectStore(createS3Client(account, opts))
}
