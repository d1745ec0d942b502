export type EndpointKind = 'amazon-s3'

export type Account = {
	endpoint: EndpointKind
	region?: string
	// Addresses DigitalOcean Spaces instead of AWS.
	isDigitalOcean: boolean
	accessKey: string
	secretKey: string
	buckets: string[]
}

export type Session = {
	account: Account | null
	encryptionKey: string
	salt: string
}

export type RawKey = {
	key: string
	size: number
	lastModified: string
}

export type RawListing = {
	keys: RawKey[]
	isTruncated: boolean
}

export type DecryptedKey = {
	encryptedKey: string
	path: string
	size: number
	lastModified: string
}

export type KeyListing = {
	keys: DecryptedKey[]
	encryptionKey: string
	salt: string
}

export type ListObjectsPage = {
	keys: RawKey[]
	isTruncated: boolean
	nextContinuationToken?: string
}

export type ListObjectsRequest = {
	bucket: string
	maxKeys: number
	continuationToken?: string
}

export type RequestOptions = {
	signal?: AbortSignal
}

export type ObjectRequest = {
	bucket: string
	key: string
}

// Transport seam: signing and HTTP live behind this interface.
export interface ObjectStore {
	listObjects(req: ListObjectsRequest, opts?: RequestOptions): Promise<ListObjectsPage>
	getObject(req: ObjectRequest): Promise<Uint8Array>
	deleteObject(req: ObjectRequest): Promise<void>
}
