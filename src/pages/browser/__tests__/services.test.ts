import { afterEach, describe, expect, it, vi } from 'vitest'

import { StorageClient } from '../../../api/client'
import { readBrowserConfig } from '../../../lib/config'
import { DecryptBridge } from '../../../lib/decryptBridge'
import { createManualPort } from '../../../test/fakes'
import { createBrowserServices } from '../services'

describe('createBrowserServices', () => {
	afterEach(() => {
		vi.useRealTimers()
	})

	it('wires the bridge to the port with the configured timeout', async () => {
		vi.useFakeTimers()
		const port = createManualPort()
		const { client, bridge } = createBrowserServices(port, readBrowserConfig({ VITE_DECRYPT_TIMEOUT_MS: '2000' }))

		expect(client).toBeInstanceOf(StorageClient)
		expect(bridge).toBeInstanceOf(DecryptBridge)
		expect(port.onmessage).not.toBeNull()

		const promise = bridge.decryptObject('cGF5bG9hZA==', 'test-key', 'test-salt')
		const assertion = expect(promise).rejects.toThrow('decrypt timed out after 2000ms')
		expect(port.sent).toHaveLength(1)
		await vi.advanceTimersByTimeAsync(2000)
		await assertion
	})
})
