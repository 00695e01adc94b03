export { OpResult, opFailure, opSuccess } from '../../shared/op-result'
export { djb2, homeSlot } from './djb2'
export { AllocationFailure, InvariantViolation, TableError } from './errors'
export { formatSlots, probeDistance, probeStats, ProbeStats } from './format'
export { TableIterator } from './iterator'
export { Slot, SlotView } from './slots'
export { createTable, INITIAL_CAPACITY, MAX_CAPACITY, Table, TableOptions } from './table'
