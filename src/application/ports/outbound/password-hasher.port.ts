/**
 * Outbound port for one-way password hashing.
 */
export interface IPasswordHasherPort {
  hash(plainText: string): Promise<string>;

  /**
   * @returns true when the plain text matches the stored hash
   */
  verify(plainText: string, hash: string): Promise<boolean>;
}
