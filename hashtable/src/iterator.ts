import { invariant } from './errors'
import { SlotView } from './slots'

// single-pass cursor over the slots of a table, create a new one to restart
export class TableIterator<V> {
    private index: number = 0
    private readonly expectedModifications: number

    constructor(private readonly table: SlotView<V>) {
        this.expectedModifications = table.modifications
    }

    /**
     * Moves to the next occupied slot and returns its entry, or `undefined`
     * once the end of the slot array has been reached.
     */
    advance(): [string, V] | undefined {
        invariant(this.table.modifications === this.expectedModifications,
            "table was modified during iteration")
        const capacity = this.table.capacity
        while (this.index < capacity) {
            const slot = this.table.slotAt(this.index)
            this.index++
            if (slot !== undefined) {
                return [slot.key, slot.value]
            }
        }
        return undefined
    }
}
