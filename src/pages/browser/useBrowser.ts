import { useMutation, useQuery, useQueryClient } from '@tanstack/react-query'
import { useCallback, useEffect, useMemo, useReducer, useRef } from 'react'

import type { ListBucketOptions, StorageClient } from '../../api/client'
import type { DecryptedKey, Session } from '../../api/types'
import { bytesToBase64, DecryptSupersededError, type DecryptBridge } from '../../lib/decryptBridge'
import { logBrowserDebug } from '../../lib/debugLog'
import { formatErrorWithHint } from '../../lib/errors'
import { buildDirectoryView, fileDisplayName } from '../../lib/fileTree'
import { saveTextFile } from '../../lib/saveFile'
import { isListingForSession, isSignedIn } from '../../lib/session'
import { browserReducer, initialBrowserState } from './browserState'

export const LISTING_QUERY_KEY = 'listing'

type UseBrowserArgs = {
	session: Session
	generation: number
	client: StorageClient
	bridge: DecryptBridge
	listOptions?: ListBucketOptions
	saveFile?: (filename: string, text: string) => void
	// Clears the persisted session, normally `useSession().signOut`.
	clearSession: () => void
}

type DownloadVars = { key: DecryptedKey; name: string; generation: number }
type DeleteVars = { encryptedKey: string; generation: number }

export function useBrowser({
	session,
	generation,
	client,
	bridge,
	listOptions,
	saveFile = saveTextFile,
	clearSession,
}: UseBrowserArgs) {
	const queryClient = useQueryClient()
	const [state, dispatch] = useReducer(browserReducer, initialBrowserState)
	const generationRef = useRef(generation)
	const downloadInFlightRef = useRef(false)
	const signedIn = isSignedIn(session)

	useEffect(() => {
		if (generationRef.current === generation) return
		generationRef.current = generation
		dispatch({ type: 'signedOut' })
	}, [generation])

	const listingQuery = useQuery({
		queryKey: [LISTING_QUERY_KEY, generation],
		enabled: signedIn,
		retry: false,
		staleTime: Infinity,
		refetchOnWindowFocus: false,
		queryFn: async ({ signal }) => {
			// The session is captured here so a later sign-out cannot change the request.
			if (!isSignedIn(session)) throw new Error('not signed in')
			const raw = await client.listBucket(session.account, listOptions, signal)
			// A cancelled fetch must not reach the bridge: its decrypt would supersede the newer one.
			if (signal.aborted) throw new Error('listing request cancelled')
			const listing = await bridge.decryptListing(raw, session.encryptionKey, session.salt)
			return { listing, truncated: raw.isTruncated, generation }
		},
	})

	const isFetchingListing = listingQuery.isFetching
	useEffect(() => {
		if (isFetchingListing) dispatch({ type: 'listingRequested' })
	}, [isFetchingListing])

	const listingData = listingQuery.data
	const listingUpdatedAt = listingQuery.dataUpdatedAt
	useEffect(() => {
		if (!listingData) return
		if (listingData.generation !== generationRef.current || !isListingForSession(listingData.listing, session)) {
			logBrowserDebug('debug', 'listing from a previous session dropped', { generation: listingData.generation })
			return
		}
		dispatch({ type: 'listingDecrypted', listing: listingData.listing, truncated: listingData.truncated })
	}, [listingData, listingUpdatedAt, session])

	const listingError = listingQuery.error
	const listingErrorAt = listingQuery.errorUpdatedAt
	useEffect(() => {
		if (!listingError || listingError instanceof DecryptSupersededError) return
		dispatch({ type: 'failed', scope: 'listing', message: formatErrorWithHint(listingError) })
	}, [listingError, listingErrorAt])

	const requestListing = useCallback(() => {
		if (!signedIn) return
		void queryClient.invalidateQueries({ queryKey: [LISTING_QUERY_KEY, generation] })
	}, [generation, queryClient, signedIn])

	const downloadMutation = useMutation({
		mutationFn: async ({ key, name, generation: issuedAt }: DownloadVars) => {
			if (!isSignedIn(session)) throw new Error('not signed in')
			const bytes = await client.getObjectBytes(session.account, key.encryptedKey)
			const text = await bridge.decryptObject(bytesToBase64(bytes), session.encryptionKey, session.salt)
			return { name, text, generation: issuedAt }
		},
		onSuccess: (result) => {
			if (result.generation !== generationRef.current) {
				logBrowserDebug('debug', 'download from a previous session dropped', { name: result.name })
				return
			}
			saveFile(result.name, result.text)
			dispatch({ type: 'fileSaved', name: result.name })
		},
		onError: (err, vars) => {
			if (err instanceof DecryptSupersededError || vars.generation !== generationRef.current) return
			dispatch({ type: 'failed', scope: 'download', message: formatErrorWithHint(err) })
		},
		onSettled: () => {
			downloadInFlightRef.current = false
		},
	})
	const { mutate: mutateDownload } = downloadMutation

	// One download at a time: object decrypt replies carry no file identity of their own.
	const download = useCallback(
		(key: DecryptedKey) => {
			if (!signedIn || downloadInFlightRef.current) return
			downloadInFlightRef.current = true
			const name = fileDisplayName(key.path, state.directory)
			dispatch({ type: 'downloadRequested', name })
			mutateDownload({ key, name, generation })
		},
		[generation, mutateDownload, signedIn, state.directory],
	)

	const deleteMutation = useMutation({
		mutationFn: ({ encryptedKey }: DeleteVars) => {
			if (!isSignedIn(session)) throw new Error('not signed in')
			return client.deleteObject(session.account, encryptedKey)
		},
		onSuccess: async (message, vars) => {
			if (vars.generation !== generationRef.current) return
			dispatch({ type: 'deleted', encryptedKey: vars.encryptedKey, message })
			await queryClient.invalidateQueries({ queryKey: [LISTING_QUERY_KEY, vars.generation] })
		},
		onError: (err, vars) => {
			if (vars.generation !== generationRef.current) return
			dispatch({ type: 'failed', scope: 'delete', message: formatErrorWithHint(err) })
		},
	})
	const { mutate: mutateDelete } = deleteMutation

	const remove = useCallback(
		(encryptedKey: string) => {
			if (!signedIn) return
			dispatch({ type: 'deleteRequested' })
			mutateDelete({ encryptedKey, generation })
		},
		[generation, mutateDelete, signedIn],
	)

	const openFolder = useCallback((directory: string) => dispatch({ type: 'folderClicked', directory }), [])
	const goBack = useCallback(() => dispatch({ type: 'backClicked' }), [])
	const toggleSelected = useCallback((key: DecryptedKey) => dispatch({ type: 'selectionToggled', key }), [])
	const toggleDropdown = useCallback((id: string) => dispatch({ type: 'dropdownToggled', id }), [])
	const rename = useCallback((key: DecryptedKey) => dispatch({ type: 'renameClicked', key }), [])
	const copyLink = useCallback((key: DecryptedKey) => dispatch({ type: 'copyLinkClicked', key }), [])

	const signOut = useCallback(() => {
		dispatch({ type: 'signedOut' })
		queryClient.removeQueries({ queryKey: [LISTING_QUERY_KEY] })
		clearSession()
	}, [clearSession, queryClient])

	const view = useMemo(
		() => buildDirectoryView(state.listing, state.folders, state.directory),
		[state.directory, state.folders, state.listing],
	)

	return {
		state,
		view,
		isListing: isFetchingListing,
		isDownloading: downloadMutation.isPending,
		isDeleting: deleteMutation.isPending,
		requestListing,
		openFolder,
		goBack,
		toggleSelected,
		toggleDropdown,
		download,
		remove,
		rename,
		copyLink,
		signOut,
	}
}
