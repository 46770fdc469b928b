/**
 * Options accepted by DbcStore.
 */
export interface DbcStoreOptions {
  /**
   * Expected header magic. `null` accepts any tag.
   * @defaultValue 'WDBC'
   */
  readonly magic?: string | null;
  /**
   * Encoding of the string block.
   * @defaultValue 'utf8'
   */
  readonly encoding?: StringBlockEncoding;
}

export type StringBlockEncoding = 'utf8' | 'latin1';
