import type { DecryptedKey, KeyListing } from '../api/types'
import { measurePerf } from './debugLog'

export type DirectoryEntry = {
	entry: DecryptedKey
	name: string
}

export type DirectoryView = {
	folders: DirectoryEntry[]
	files: DirectoryEntry[]
}

// Encrypted names are obfuscated per segment, so the first `depth`
// encrypted segments address the same folder as the decrypted ones.
function encryptedPrefix(encryptedKey: string, depth: number): string {
	const parts = encryptedKey.split('/')
	if (parts.length < depth) return encryptedKey
	return parts.slice(0, depth).join('/') + '/'
}

// Promotes "a/b/file.txt" to the folder key "a/b/". Keys already ending
// in "/" are folder markers and pass through. A root-level file has no
// parent folder and becomes the empty path.
export function extractFolder(key: DecryptedKey): DecryptedKey {
	const segments = key.path.split('/')
	if (segments[segments.length - 1] === '') return key
	const parentSegments = segments.slice(0, -1)
	if (parentSegments.length === 0) return { ...key, path: '' }
	return {
		...key,
		encryptedKey: encryptedPrefix(key.encryptedKey, parentSegments.length),
		path: parentSegments.join('/') + '/',
	}
}

export function extractFolders(keys: DecryptedKey[]): DecryptedKey[] {
	return keys.map(extractFolder)
}

function withAncestors(folder: DecryptedKey): DecryptedKey[] {
	const segments = folder.path.split('/').slice(0, -1)
	const out: DecryptedKey[] = []
	for (let depth = 1; depth <= segments.length; depth++) {
		out.push({
			...folder,
			encryptedKey: encryptedPrefix(folder.encryptedKey, depth),
			path: segments.slice(0, depth).join('/') + '/',
		})
	}
	return out
}

// Every distinct folder implied by the listing, ancestors included,
// first occurrence wins.
export function buildFolderSet(keys: DecryptedKey[]): DecryptedKey[] {
	return measurePerf(
		'fileTree.buildFolderSet',
		() => {
			const seen = new Set<string>()
			const out: DecryptedKey[] = []
			for (const folder of extractFolders(keys)) {
				if (folder.path.split('/').length < 2) continue
				for (const candidate of withAncestors(folder)) {
					if (seen.has(candidate.path)) continue
					seen.add(candidate.path)
					out.push(candidate)
				}
			}
			return out
		},
		{ keys: keys.length },
	)
}

export function isDirectChildFolder(folderPath: string, directory: string): boolean {
	if (!folderPath.startsWith(directory) || folderPath === directory) return false
	return folderPath.slice(directory.length).split('/').length === 2
}

export function isDirectChildFile(path: string, directory: string): boolean {
	if (!path.startsWith(directory)) return false
	const rest = path.slice(directory.length)
	return rest !== '' && rest.split('/').length === 1
}

export function foldersInDirectory(folders: DecryptedKey[], directory: string): DecryptedKey[] {
	return folders.filter((folder) => isDirectChildFolder(folder.path, directory))
}

export function filesInDirectory(keys: DecryptedKey[], directory: string): DecryptedKey[] {
	return keys.filter((key) => isDirectChildFile(key.path, directory))
}

export function folderDisplayName(folderPath: string, directory: string): string {
	const rest = folderPath.startsWith(directory) ? folderPath.slice(directory.length) : folderPath
	return rest.replace(/\/$/, '')
}

export function fileDisplayName(path: string, directory: string): string {
	return path.startsWith(directory) ? path.slice(directory.length) : path
}

// "a/b/" -> "a/", "a/" -> "", "" stays "".
export function parentDirectory(directory: string): string {
	const segments = directory.split('/')
	if (segments.length < 2) return directory
	const kept = segments.slice(0, -2)
	return kept.length > 0 ? kept.join('/') + '/' : ''
}

export function buildDirectoryView(listing: KeyListing | null, folders: DecryptedKey[], directory: string): DirectoryView {
	if (!listing) return { folders: [], files: [] }
	return {
		folders: foldersInDirectory(folders, directory).map((entry) => ({
			entry,
			name: folderDisplayName(entry.path, directory),
		})),
		files: filesInDirectory(listing.keys, directory).map((entry) => ({
			entry,
			name: fileDisplayName(entry.path, directory),
		})),
	}
}
