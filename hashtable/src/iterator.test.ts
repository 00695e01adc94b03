import { describe, expect, test } from '@jest/globals';
import { InvariantViolation } from './errors';
import { Table } from './table';

function tableOf(keys: string[]): Table<number> {
    let table = new Table<number>()
    keys.forEach((key, i) => table.set(key, i))
    return table
}

describe('TableIterator', () => {
    test('empty table is exhausted', () => {
        let iterator = new Table<number>().createIterator()
        expect(iterator.advance()).toBeUndefined()
    })

    test('yields every entry once', () => {
        let iterator = tableOf(["A", "B", "C"]).createIterator()
        let seen: [string, number][] = []
        for (let entry = iterator.advance(); entry !== undefined; entry = iterator.advance()) {
            seen.push(entry)
        }
        expect(seen.length).toBe(3)
        expect(new Map(seen)).toEqual(new Map([["A", 0], ["B", 1], ["C", 2]]))
    })

    test('stays exhausted', () => {
        let iterator = tableOf(["a"]).createIterator()
        expect(iterator.advance()).toEqual(["a", 0])
        expect(iterator.advance()).toBeUndefined()
        expect(iterator.advance()).toBeUndefined()
    })

    test('slot order, not insertion order', () => {
        // "a" home 6, "b" home 7, "q" home 6
        expect(Array.from(tableOf(["b", "a"]).keys())).toEqual(["a", "b"])
        expect(Array.from(tableOf(["q", "b", "a"]).keys())).toEqual(["q", "b", "a"])
        expect(Array.from(tableOf(["a", "q", "b"]).keys())).toEqual(["a", "q", "b"])
    })

    test('new iterator restarts', () => {
        let table = tableOf(["a", "b"])
        let first = table.createIterator()
        first.advance()
        first.advance()
        expect(first.advance()).toBeUndefined()
        expect(table.createIterator().advance()).toEqual(["a", 0])
    })

    test('values', () => {
        expect(Array.from(tableOf(["b", "a"]).values())).toEqual([1, 0])
    })

    test('modified during iteration', () => {
        let table = tableOf(["a", "b"])
        let iterator = table.createIterator()
        iterator.advance()
        table.set("c", 2)
        expect(() => iterator.advance()).toThrow(InvariantViolation)
    })

    test('update during iteration', () => {
        let table = tableOf(["a", "b"])
        expect(() => {
            for (let [key, value] of table) {
                table.set(key, value + 1)
            }
        }).toThrow("table was modified during iteration")
    })

    test('destroyed during iteration', () => {
        let table = tableOf(["a"])
        let iterator = table.createIterator()
        table.destroy()
        expect(() => iterator.advance()).toThrow(InvariantViolation)
    })
})
