import type { Got } from 'got';

/**
 * Authentication — strategy consumed by MoneybirdClient.
 *
 * A session is a got instance with the credentials baked into its default
 * headers. Strategies build a fresh one on every call; the client decides
 * when to ask for a new session (see MoneybirdClient.renewSession).
 */
export interface Authentication {
  /**
   * Whether authentication can be performed. A negative result means a
   * request made with this strategy is certain not to authenticate.
   */
  isReady(): boolean;

  /** Creates a new session with the authentication settings applied. */
  getSession(): Got;
}
