/**
 * Item source interface.
 * Produces the items for one named collection; keys must be unique.
 */

import type { Item } from '../types/models.js';

export interface ItemCollection<P = unknown> {
  /** Display name of the collection, when the source knows one. */
  name: string | null;
  items: Item<P>[];
}

export interface IItemSource<P = unknown> {
  /** Load every item of the collection, in the order the source presents them. */
  load(collection: string): Promise<ItemCollection<P>>;
}
