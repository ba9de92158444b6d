/**
 * Host-provided store that resolves named secrets.
 */
export interface SecretProvider {
  /**
   * Resolves a secret by name.
   *
   * @param name Secret name as written in `from_secret`.
   * @returns Secret value, or undefined when the store has no such secret.
   */
  resolve(name: string): Promise<string | undefined>
}
