import type { DecryptedKey, KeyListing } from '../../api/types'
import { buildFolderSet, parentDirectory } from '../../lib/fileTree'

export type ListingStatus = 'idle' | 'loading' | 'ready' | 'error'

export type FailureScope = 'listing' | 'download' | 'delete'

export type BrowserState = {
	// "/"-joined prefix, "" is the bucket root.
	directory: string
	// Decrypted path of the item whose dropdown is open, "" when closed.
	expanded: string
	selection: DecryptedKey[]
	listing: KeyListing | null
	folders: DecryptedKey[]
	listingStatus: ListingStatus
	pendingDownload: string
	status: string
}

export type BrowserAction =
	| { type: 'folderClicked'; directory: string }
	| { type: 'backClicked' }
	| { type: 'selectionToggled'; key: DecryptedKey }
	| { type: 'dropdownToggled'; id: string }
	| { type: 'listingRequested' }
	| { type: 'listingDecrypted'; listing: KeyListing; truncated: boolean }
	| { type: 'downloadRequested'; name: string }
	| { type: 'fileSaved'; name: string }
	| { type: 'deleteRequested' }
	| { type: 'deleted'; encryptedKey: string; message: string }
	| { type: 'failed'; scope: FailureScope; message: string }
	| { type: 'renameClicked'; key: DecryptedKey }
	| { type: 'copyLinkClicked'; key: DecryptedKey }
	| { type: 'signedOut' }

export const initialBrowserState: BrowserState = {
	directory: '',
	expanded: '',
	selection: [],
	listing: null,
	folders: [],
	listingStatus: 'idle',
	pendingDownload: '',
	status: '',
}

export function sameKey(a: DecryptedKey, b: DecryptedKey): boolean {
	return (
		a.encryptedKey === b.encryptedKey && a.path === b.path && a.size === b.size && a.lastModified === b.lastModified
	)
}

export function isSelected(selection: DecryptedKey[], key: DecryptedKey): boolean {
	return selection.some((k) => sameKey(k, key))
}

export function toggleSelection(selection: DecryptedKey[], key: DecryptedKey): DecryptedKey[] {
	if (isSelected(selection, key)) return selection.filter((k) => !sameKey(k, key))
	return [key, ...selection]
}

export function receivedStatus(listing: KeyListing, truncated: boolean): string {
	if (!truncated) return 'received'
	return `received (first ${listing.keys.length} objects; listing truncated)`
}

export function browserReducer(state: BrowserState, action: BrowserAction): BrowserState {
	switch (action.type) {
		case 'folderClicked':
			return { ...state, directory: action.directory, expanded: '' }
		case 'backClicked': {
			const directory = parentDirectory(state.directory)
			if (directory === state.directory) return state
			return { ...state, directory }
		}
		case 'selectionToggled':
			return { ...state, selection: toggleSelection(state.selection, action.key) }
		case 'dropdownToggled':
			return { ...state, expanded: state.expanded === action.id ? '' : action.id }
		case 'listingRequested':
			return { ...state, listingStatus: 'loading', status: 'loading' }
		case 'listingDecrypted':
			return {
				...state,
				listing: action.listing,
				folders: buildFolderSet(action.listing.keys),
				listingStatus: 'ready',
				status: receivedStatus(action.listing, action.truncated),
			}
		case 'downloadRequested':
			return { ...state, expanded: '', pendingDownload: action.name, status: `Downloading ${action.name}` }
		case 'fileSaved':
			return { ...state, pendingDownload: '', status: `Saved ${action.name}` }
		case 'deleteRequested':
			return { ...state, expanded: '' }
		case 'deleted':
			return {
				...state,
				selection: state.selection.filter((k) => k.encryptedKey !== action.encryptedKey),
				status: action.message,
			}
		case 'failed':
			if (action.scope === 'listing') return { ...state, listingStatus: 'error', status: action.message }
			if (action.scope === 'download') return { ...state, pendingDownload: '', status: action.message }
			return { ...state, status: action.message }
		case 'renameClicked':
		case 'copyLinkClicked':
			// Not supported yet; accepted so menus can dispatch them.
			return state
		case 'signedOut':
			return initialBrowserState
	}
}
