// src/core/normalizer/Normalizer.ts

import type { Bookmark } from './types';
import { mapDiigoBookmark, recordIdOf } from './DiigoMapper';

export class Normalizer {
  /**
   * Decode one page of raw Diigo records, preserving their order.
   * The first invalid record aborts the whole page.
   *
   * @param offset - Position of the page's first record in the full listing
   * @throws {ValidationError} If any record fails to decode
   */
  normalize(rawData: readonly unknown[], offset = 0): Bookmark[] {
    return rawData.map((item, index) => mapDiigoBookmark(item, recordIdOf(item, offset + index)));
  }
}
