import { DeleteObjectCommand, GetObjectCommand, ListObjectsV2Command, S3ServiceException } from '@aws-sdk/client-s3'
import { describe, expect, it, vi } from 'vitest'

import { TEST_ACCOUNT } from '../../test/fakes'
import { StorageError } from '../client'
import { createS3Client, resolveEndpoint, resolveRegion, S3ObjectStore, type S3Sender } from '../s3Store'

function storeWith(send: ReturnType<typeof vi.fn>) {
	return new S3ObjectStore({ send } as unknown as S3Sender)
}

describe('endpoint selection', () => {
	it('uses AWS regional addressing by default', () => {
		expect(resolveEndpoint(TEST_ACCOUNT)).toBeUndefined()
		expect(resolveRegion(TEST_ACCOUNT)).toBe('eu-west-1')
		expect(resolveRegion({ ...TEST_ACCOUNT, region: undefined })).toBe('us-east-1')
	})

	it('addresses DigitalOcean Spaces when selected', () => {
		const account = { ...TEST_ACCOUNT, isDigitalOcean: true, region: undefined }
		expect(resolveRegion(account)).toBe('nyc3')
		expect(resolveEndpoint(account)).toBe('https://nyc3.digitaloceanspaces.com')
		expect(resolveEndpoint({ ...account, region: 'ams3' })).toBe('https://ams3.digitaloceanspaces.com')
	})

	it('configures the client region from the account', async () => {
		const client = createS3Client({ ...TEST_ACCOUNT, isDigitalOcean: true, region: 'sfo3' })
		const region = client.config.region
		expect(typeof region === 'function' ? await region() : region).toBe('sfo3')
	})
})

describe('S3ObjectStore', () => {
	it('lists one page of keys', async () => {
		const send = vi.fn().mockResolvedValue({
			Contents: [
				{ Key: 'enc-a', Size: 3, LastModified: new Date('2024-01-02T00:00:00Z') },
				{ Size: 9 },
				{ Key: 'enc-b' },
			],
			IsTruncated: true,
			NextContinuationToken: 'token-1',
		})
		const page = await storeWith(send).listObjects({ bucket: 'test-bucket', maxKeys: 100, continuationToken: 'token-0' })

		const command = send.mock.calls[0][0]
		expect(command).toBeInstanceOf(ListObjectsV2Command)
		expect(send.mock.calls[0][1]).toEqual({ abortSignal: undefined })
		expect(command.input).toEqual({ Bucket: 'test-bucket', MaxKeys: 100, ContinuationToken: 'token-0' })
		expect(page).toEqual({
			keys: [
				{ key: 'enc-a', size: 3, lastModified: '2024-01-02T00:00:00.000Z' },
				{ key: 'enc-b', size: 0, lastModified: '' },
			],
			isTruncated: true,
			nextContinuationToken: 'token-1',
		})
	})

	it('forwards the abort signal to the SDK', async () => {
		const send = vi.fn().mockResolvedValue({})
		const controller = new AbortController()
		await storeWith(send).listObjects({ bucket: 'test-bucket', maxKeys: 100 }, { signal: controller.signal })
		expect(send.mock.calls[0][1]).toEqual({ abortSignal: controller.signal })
	})

	it('reads object bodies as bytes', async () => {
		const send = vi.fn().mockResolvedValue({ Body: { transformToByteArray: async () => new Uint8Array([1, 2, 3]) } })
		const bytes = await storeWith(send).getObject({ bucket: 'test-bucket', key: 'enc-a' })

		expect(send.mock.calls[0][0]).toBeInstanceOf(GetObjectCommand)
		expect(send.mock.calls[0][0].input).toEqual({ Bucket: 'test-bucket', Key: 'enc-a' })
		expect(Array.from(bytes)).toEqual([1, 2, 3])
	})

	it('returns an empty body when S3 sends none', async () => {
		const send = vi.fn().mockResolvedValue({})
		const bytes = await storeWith(send).getObject({ bucket: 'test-bucket', key: 'enc-a' })
		expect(bytes).toHaveLength(0)
	})

	it('deletes by key', async () => {
		const send = vi.fn().mockResolvedValue({})
		await storeWith(send).deleteObject({ bucket: 'test-bucket', key: 'enc-a' })
		expect(send.mock.calls[0][0]).toBeInstanceOf(DeleteObjectCommand)
		expect(send.mock.calls[0][0].input).toEqual({ Bucket: 'test-bucket', Key: 'enc-a' })
	})

	it('translates service exceptions into StorageError', async () => {
		const send = vi.fn().mockRejectedValue(
			new S3ServiceException({
				name: 'NoSuchBucket',
				$fault: 'client',
				$metadata: { httpStatusCode: 404 },
				message: 'The specified bucket does not exist',
			}),
		)
		const err = await storeWith(send)
			.listObjects({ bucket: 'missing', maxKeys: 100 })
			.catch((e: unknown) => e)

		expect(err).toBeInstanceOf(StorageError)
		expect(err).toMatchObject({
			status: 404,
			code: 'NoSuchBucket',
			message: 'The specified bucket does not exist',
			retryable: false,
		})
	})

	it('marks server faults retryable', async () => {
		const send = vi.fn().mockRejectedValue(
			new S3ServiceException({ name: 'InternalError', $fault: 'server', $metadata: { httpStatusCode: 500 } }),
		)
		await expect(storeWith(send).deleteObject({ bucket: 'b', key: 'k' })).rejects.toMatchObject({
			code: 'InternalError',
			retryable: true,
		})
	})
})
