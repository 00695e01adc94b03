import { OpResult, opFailure, opSuccess } from '../../shared/op-result'
import { djb2 } from './djb2'
import { AllocationFailure, invariant } from './errors'
import { TableIterator } from './iterator'
import { allocateSlots, isPowerOfTwo, probe, Slot, SlotArray, SlotView } from './slots'

export const INITIAL_CAPACITY = 16

// largest power of two below the array length limit
export const MAX_CAPACITY = 2 ** 31

export type TableOptions = {
    initialCapacity?: number
    maxCapacity?: number
}

/**
 * String-keyed map with open addressing and linear probing.
 *
 * Grows to twice its capacity whenever a `set` starts with the table half
 * full, so at least half of the slots stay empty and probing terminates.
 * Iteration follows slot order, which depends on the hashes and not on the
 * order of insertion.
 */
export class Table<V> implements SlotView<V>, Iterable<[string, V]> {
    private slots: SlotArray<V>
    private count: number = 0
    private version: number = 0
    private destroyed: boolean = false
    readonly maxCapacity: number

    constructor(options: TableOptions = {}) {
        const initialCapacity = options.initialCapacity ?? INITIAL_CAPACITY
        this.maxCapacity = options.maxCapacity ?? MAX_CAPACITY
        invariant(isPowerOfTwo(initialCapacity) && initialCapacity >= 2,
            `initial capacity must be a power of two >= 2, got ${initialCapacity}`)
        invariant(isPowerOfTwo(this.maxCapacity) && this.maxCapacity <= MAX_CAPACITY,
            `max capacity must be a power of two <= ${MAX_CAPACITY}, got ${this.maxCapacity}`)
        invariant(initialCapacity <= this.maxCapacity,
            `initial capacity ${initialCapacity} exceeds max capacity ${this.maxCapacity}`)
        this.slots = allocateSlots(initialCapacity)
    }

    get length(): number {
        this.checkAlive()
        return this.count
    }

    get capacity(): number {
        this.checkAlive()
        return this.slots.length
    }

    get modifications(): number {
        return this.version
    }

    slotAt(index: number): Slot<V> | undefined {
        this.checkAlive()
        return this.slots[index]
    }

    get(key: string): V | undefined {
        return this.find(key)?.value
    }

    has(key: string): boolean {
        return this.find(key) !== undefined
    }

    /**
     * Inserts `key` or replaces its value. Returns the key the value is now
     * stored under; fails only when the table would have to grow past
     * `maxCapacity`, in which case nothing changed.
     */
    set(key: string, value: V): OpResult<string, AllocationFailure> {
        this.checkAlive()
        if (this.count >= this.slots.length / 2) {
            const grown = this.expand()
            if (!grown.success) {
                return grown
            }
        }
        const hash = djb2(key)
        const index = probe(this.slots, key, hash)
        const slot = this.slots[index]
        this.version++
        if (slot !== undefined) {
            slot.value = value
            return opSuccess(slot.key)
        }
        this.slots[index] = { key, hash, value }
        this.count++
        return opSuccess(key)
    }

    createIterator(): TableIterator<V> {
        this.checkAlive()
        return new TableIterator(this)
    }

    *entries(): Generator<[string, V]> {
        const iterator = this.createIterator()
        for (let entry = iterator.advance(); entry !== undefined; entry = iterator.advance()) {
            yield entry
        }
    }

    *keys(): Generator<string> {
        for (const [key, _] of this.entries()) {
            yield key
        }
    }

    *values(): Generator<V> {
        for (const [_, value] of this.entries()) {
            yield value
        }
    }

    [Symbol.iterator](): Generator<[string, V]> {
        return this.entries()
    }

    // values belong to the caller and are left alone
    destroy(): void {
        this.checkAlive()
        this.slots = []
        this.count = 0
        this.version++
        this.destroyed = true
    }

    private find(key: string): Slot<V> | undefined {
        this.checkAlive()
        return this.slots[probe(this.slots, key, djb2(key))]
    }

    private expand(): OpResult<void, AllocationFailure> {
        const newCapacity = this.slots.length * 2
        if (newCapacity > this.maxCapacity) {
            return opFailure(new AllocationFailure(
                `cannot grow beyond ${this.slots.length} slots (max capacity ${this.maxCapacity})`))
        }
        const newSlots = allocateSlots<V>(newCapacity)
        for (const slot of this.slots) {
            if (slot !== undefined) {
                newSlots[probe(newSlots, slot.key, slot.hash)] = slot
            }
        }
        this.slots = newSlots
        this.version++
        return opSuccess(undefined)
    }

    private checkAlive(): void {
        invariant(!this.destroyed, "table has been destroyed")
    }
}

export function createTable<V>(options: TableOptions = {}): OpResult<Table<V>, AllocationFailure> {
    const initialCapacity = options.initialCapacity ?? INITIAL_CAPACITY
    const maxCapacity = options.maxCapacity ?? MAX_CAPACITY
    if (initialCapacity > maxCapacity) {
        return opFailure(new AllocationFailure(
            `initial capacity ${initialCapacity} exceeds max capacity ${maxCapacity}`))
    }
    return opSuccess(new Table<V>(options))
}
