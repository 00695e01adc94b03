import { homeSlot } from './djb2'
import { Slot, SlotView } from './slots'

export type ProbeStats = {
    length: number
    capacity: number
    loadFactor: number
    longestProbe: number
    averageProbe: number
}

// steps between the home slot of the entry and where it was placed
export function probeDistance(slot: Slot<unknown>, index: number, capacity: number): number {
    return (index - homeSlot(slot.hash, capacity) + capacity) & (capacity - 1)
}

export function probeStats(table: SlotView<unknown>): ProbeStats {
    const capacity = table.capacity
    let length = 0
    let longestProbe = 0
    let totalProbe = 0
    for (let i = 0; i < capacity; i++) {
        const slot = table.slotAt(i)
        if (slot === undefined) {
            continue
        }
        const distance = probeDistance(slot, i, capacity)
        length++
        totalProbe += distance
        longestProbe = Math.max(longestProbe, distance)
    }
    return {
        length,
        capacity,
        loadFactor: length / capacity,
        longestProbe,
        averageProbe: length > 0 ? totalProbe / length : 0,
    }
}

export function formatSlots(table: SlotView<unknown>): string {
    const capacity = table.capacity
    const lines: string[] = []
    for (let i = 0; i < capacity; i++) {
        const slot = table.slotAt(i)
        if (slot === undefined) {
            lines.push(`${i}: -`)
        } else {
            lines.push(`${i}: ${slot.key} (+${probeDistance(slot, i, capacity)})`)
        }
    }
    return lines.join("\n")
}
