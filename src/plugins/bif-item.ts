/**
 * Declarative record of a script-level item a plugin provides. Declaring
 * an item does not register it with the interpreter; that happens
 * separately.
 */

export type BifItemType = 'Function' | 'Event' | 'Constant' | 'Global' | 'Type';

export const BIF_ITEM_TYPES: readonly BifItemType[] = ['Function', 'Event', 'Constant', 'Global', 'Type'];

export class BifItem {
  /**
   * @param id - Fully qualified script-level name, e.g. `Demo::foo`.
   */
  constructor(
    readonly id: string,
    readonly type: BifItemType
  ) {
    Object.freeze(this);
  }

  describe(): string {
    return `[${this.type}] ${this.id}`;
  }
}
