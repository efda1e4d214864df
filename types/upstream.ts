/**
 * Upstream client capability.
 *
 * The authenticated, cookie-based client lives outside this repository; the
 * engine only needs these operations and assumes nothing about transport.
 * Implementations signal failures by throwing; the retry policy classifies
 * whatever they throw.
 */

export interface SearchOptions {
    /** Opaque next-page token to resume from */
    cursor?: string;
}

export interface UpstreamPage {
    /** Raw payloads on this page, in upstream order */
    records(): unknown[];
    /** The following page, or null at end of results */
    next(): Promise<UpstreamPage | null>;
    /** Token that re-opens this page through `search(query, { cursor })` */
    readonly cursor?: string;
}

export interface UpstreamSession {
    search(query: string, options?: SearchOptions): Promise<UpstreamPage>;
    /** Raw payload, or null when the record does not exist */
    fetchById(id: string): Promise<unknown | null>;
    close(): Promise<void>;
}

export interface UpstreamClient {
    /** Throws when credentials are missing or rejected */
    authenticate(): Promise<UpstreamSession>;
}
