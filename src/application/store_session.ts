import { StoreName, errorMessage, toStoreFailure } from '../domain/errors';

interface Closable {
    close(): Promise<void>;
}

/**
 * Opens a session on `store`, runs `fn`, and always closes the session.
 * Driver errors (connect included) surface as StoreOperationFailedError for `name`.
 */
export async function withSession<S extends Closable, T>(
    name: StoreName,
    store: { connect(): Promise<S> },
    fn: (session: S) => Promise<T>,
): Promise<T> {
    const session = await openSession(name, store);
    try {
        return await fn(session);
    } catch (error) {
        throw toStoreFailure(name, error);
    } finally {
        await closeSession(name, session);
    }
}

export async function openSession<S>(name: StoreName, store: { connect(): Promise<S> }): Promise<S> {
    try {
        return await store.connect();
    } catch (error) {
        throw toStoreFailure(name, error);
    }
}

/**
 * Closes `session` without letting a close failure replace the operation's outcome.
 */
export async function closeSession(name: StoreName, session: Closable): Promise<void> {
    try {
        await session.close();
    } catch (closeError: unknown) {
        console.error(`[Store] CLOSE FAILED (${name}): ${errorMessage(closeError)}`);
    }
}
