import { StorageClient } from '../../api/client'
import { createS3ObjectStore } from '../../api/s3Store'
import { getBrowserConfig, type BrowserConfig } from '../../lib/config'
import { DecryptBridge, type DecryptPort } from '../../lib/decryptBridge'

export type BrowserServices = {
	client: StorageClient
	bridge: DecryptBridge
}

export function createBrowserServices(port: DecryptPort, config: BrowserConfig = getBrowserConfig()): BrowserServices {
	return {
		client: new StorageClient({
			createStore: (account) => createS3ObjectStore(account, { maxAttempts: config.s3MaxAttempts }),
			listing: {
				maxKeys: config.listMaxKeys,
				followContinuation: config.listFollowContinuation,
				maxPages: config.listMaxPages,
			},
		}),
		bridge: new DecryptBridge(port, { timeoutMs: config.decryptTimeoutMs }),
	}
}
