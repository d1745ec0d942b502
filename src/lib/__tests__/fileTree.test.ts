import { describe, expect, it } from 'vitest'

import type { KeyListing } from '../../api/types'
import { makeKey } from '../../test/fakes'
import {
	buildDirectoryView,
	buildFolderSet,
	extractFolder,
	fileDisplayName,
	filesInDirectory,
	folderDisplayName,
	foldersInDirectory,
	parentDirectory,
} from '../fileTree'

function listingOf(...keys: ReturnType<typeof makeKey>[]): KeyListing {
	return { keys, encryptionKey: 'test-key', salt: 'test-salt' }
}

describe('extractFolder', () => {
	it('promotes a file path to its parent folder', () => {
		const folder = extractFolder(makeKey('a/b/file.txt', 'x1/x2/x3'))
		expect(folder.path).toBe('a/b/')
		expect(folder.encryptedKey).toBe('x1/x2/')
	})

	it('keeps folder markers unchanged', () => {
		const marker = makeKey('photos/', 'p1/')
		expect(extractFolder(marker)).toBe(marker)
	})

	it('maps root-level files to the empty path', () => {
		expect(extractFolder(makeKey('readme.txt')).path).toBe('')
	})
})

describe('buildFolderSet', () => {
	it('deduplicates folders keeping the first occurrence', () => {
		const folders = buildFolderSet([makeKey('b/1.txt'), makeKey('a/2.txt'), makeKey('b/3.txt')])
		expect(folders.map((f) => f.path)).toEqual(['b/', 'a/'])
		expect(folders[0].encryptedKey).toBe('enc:b/')
	})

	it('includes every ancestor of a nested file', () => {
		const folders = buildFolderSet([makeKey('a/b/c.txt', 'x1/x2/x3')])
		expect(folders.map((f) => [f.path, f.encryptedKey])).toEqual([
			['a/', 'x1/'],
			['a/b/', 'x1/x2/'],
		])
	})

	it('produces only slash-terminated, unique paths', () => {
		const folders = buildFolderSet([
			makeKey('readme.txt'),
			makeKey('docs/a.txt'),
			makeKey('docs/deep/b.txt'),
			makeKey('docs/'),
			makeKey('music/x/y/z.mp3'),
		])
		const paths = folders.map((f) => f.path)
		expect(paths).toEqual(['docs/', 'docs/deep/', 'music/', 'music/x/', 'music/x/y/'])
		expect(paths.every((p) => p.endsWith('/'))).toBe(true)
		expect(new Set(paths).size).toBe(paths.length)
	})
})

describe('directory filters', () => {
	const keys = [makeKey('top.txt'), makeKey('docs/a.txt'), makeKey('docs/deep/b.txt'), makeKey('docs/')]
	const folders = buildFolderSet(keys)

	it('selects direct child folders only', () => {
		expect(foldersInDirectory(folders, '').map((f) => f.path)).toEqual(['docs/'])
		expect(foldersInDirectory(folders, 'docs/').map((f) => f.path)).toEqual(['docs/deep/'])
		expect(foldersInDirectory(folders, 'docs/deep/')).toEqual([])
	})

	it('selects files with no further slash below the directory', () => {
		expect(filesInDirectory(keys, '').map((k) => k.path)).toEqual(['top.txt'])
		expect(filesInDirectory(keys, 'docs/').map((k) => k.path)).toEqual(['docs/a.txt'])
		expect(filesInDirectory(keys, 'docs/deep/').map((k) => k.path)).toEqual(['docs/deep/b.txt'])
	})

	it('strips the directory prefix for display', () => {
		expect(folderDisplayName('docs/deep/', 'docs/')).toBe('deep')
		expect(folderDisplayName('docs/', '')).toBe('docs')
		expect(fileDisplayName('docs/a.txt', 'docs/')).toBe('a.txt')
	})
})

describe('parentDirectory', () => {
	it('drops the last folder segment', () => {
		expect(parentDirectory('a/b/')).toBe('a/')
		expect(parentDirectory('a/')).toBe('')
	})

	it('is a no-op at the root', () => {
		expect(parentDirectory('')).toBe('')
	})

	it('returns to the starting directory after entering any child folder', () => {
		for (const start of ['', 'a/', 'a/b/', 'a/b/c/']) {
			expect(parentDirectory(`${start}child/`)).toBe(start)
		}
	})
})

describe('buildDirectoryView', () => {
	const listing = listingOf(
		makeKey('docs/report.txt', 'a%enc/b%enc'),
		makeKey('docs/notes.txt', 'a%enc/c%enc'),
		makeKey('readme.txt', 'd%enc'),
	)
	const folders = buildFolderSet(listing.keys)

	it('shows folders and files at the root', () => {
		const view = buildDirectoryView(listing, folders, '')
		expect(view.folders.map((f) => f.name)).toEqual(['docs'])
		expect(view.folders[0].entry.encryptedKey).toBe('a%enc/')
		expect(view.files.map((f) => f.name)).toEqual(['readme.txt'])
	})

	it('shows the files inside a folder', () => {
		const view = buildDirectoryView(listing, folders, 'docs/')
		expect(view.folders).toEqual([])
		expect(view.files.map((f) => f.name)).toEqual(['report.txt', 'notes.txt'])
	})

	it('is empty without a listing', () => {
		expect(buildDirectoryView(null, [], '')).toEqual({ folders: [], files: [] })
	})
})
