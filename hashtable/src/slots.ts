import { homeSlot } from './djb2'

export type Slot<V> = {
    readonly key: string
    readonly hash: bigint
    value: V
}

export type SlotArray<V> = (Slot<V> | undefined)[]

export interface SlotView<V> {
    readonly capacity: number
    // bumped on every mutation, lets cursors notice they went stale
    readonly modifications: number
    slotAt(index: number): Slot<V> | undefined
}

export function isPowerOfTwo(n: number): boolean {
    return Number.isInteger(n) && n > 0 && (n & (n - 1)) === 0
}

export function allocateSlots<V>(capacity: number): SlotArray<V> {
    return new Array<Slot<V> | undefined>(capacity).fill(undefined)
}

/**
 * Linear probing from the home slot of `hash`. Returns the index of the slot
 * holding `key`, or of the first empty slot on the way if the key is absent.
 *
 * Loops forever on a full array, the growth policy keeps at least half of
 * the slots empty.
 */
export function probe<V>(slots: SlotArray<V>, key: string, hash: bigint): number {
    const mask = slots.length - 1
    let index = homeSlot(hash, slots.length)
    for (;;) {
        const slot = slots[index]
        if (slot === undefined || slot.key === key) {
            return index
        }
        index = (index + 1) & mask
    }
}
