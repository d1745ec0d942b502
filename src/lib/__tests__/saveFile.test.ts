import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import { saveTextFile } from '../saveFile'

describe('saveTextFile', () => {
	const createObjectURL = vi.fn((_blob: Blob) => 'blob:test')
	const revokeObjectURL = vi.fn()

	beforeEach(() => {
		createObjectURL.mockClear()
		Object.defineProperty(URL, 'createObjectURL', { value: createObjectURL, configurable: true, writable: true })
		Object.defineProperty(URL, 'revokeObjectURL', { value: revokeObjectURL, configurable: true, writable: true })
	})

	afterEach(() => {
		vi.useRealTimers()
	})

	it('saves the text as a plain-text blob under the given name', () => {
		vi.useFakeTimers()
		const clicked: Array<{ download: string; href: string }> = []
		vi.spyOn(HTMLAnchorElement.prototype, 'click').mockImplementation(function (this: HTMLAnchorElement) {
			clicked.push({ download: this.download, href: this.href })
		})

		saveTextFile('report.txt', 'hello')

		const blob = createObjectURL.mock.calls[0][0]
		expect(blob.type).toBe('text/plain')
		expect(blob.size).toBe(5)
		expect(clicked).toEqual([{ download: 'report.txt', href: 'blob:test' }])
		expect(document.querySelector('a[download]')).toBeNull()

		vi.runAllTimers()
		expect(revokeObjectURL).toHaveBeenCalledWith('blob:test')
	})

	it('falls back to a default name', () => {
		const clicked: string[] = []
		vi.spyOn(HTMLAnchorElement.prototype, 'click').mockImplementation(function (this: HTMLAnchorElement) {
			clicked.push(this.download)
		})
		saveTextFile('', 'x')
		expect(clicked).toEqual(['download.txt'])
	})
})
