import { useCallback, useEffect, useMemo, useState } from 'react'

import type { Session } from '../api/types'
import {
	EMPTY_SESSION,
	SESSION_STORAGE_KEY,
	createCredentialStore,
	isSignedIn,
	validateSignIn,
	type CredentialStore,
	type SignInForm,
	type SignInResult,
} from './session'

type SessionState = {
	session: Session
	// Bumped on every session change; stamps in-flight requests.
	generation: number
}

export function useSession(args: { store?: CredentialStore } = {}) {
	const store = useMemo(() => args.store ?? createCredentialStore(), [args.store])
	const [state, setState] = useState<SessionState>(() => ({ session: store.restore(), generation: 0 }))

	const signIn = useCallback(
		(form: SignInForm): SignInResult => {
			const result = validateSignIn(form)
			if (!result.ok) return result
			const { account, encryptionKey, salt } = result.session
			store.signIn(account, encryptionKey, salt)
			setState((prev) => ({ session: result.session, generation: prev.generation + 1 }))
			return result
		},
		[store],
	)

	const signOut = useCallback(() => {
		store.signOut()
		setState((prev) => ({ session: EMPTY_SESSION, generation: prev.generation + 1 }))
	}, [store])

	useEffect(() => {
		if (typeof window === 'undefined') return
		const handleStorage = (event: StorageEvent) => {
			if (event.key !== SESSION_STORAGE_KEY) return
			setState((prev) => ({ session: store.restore(), generation: prev.generation + 1 }))
		}
		window.addEventListener('storage', handleStorage)
		return () => window.removeEventListener('storage', handleStorage)
	}, [store])

	return {
		session: state.session,
		generation: state.generation,
		signedIn: isSignedIn(state.session),
		signIn,
		signOut,
	}
}
