import { formatSlots, probeStats } from './format'
import { Table } from './table'

let count = 1000

let players = new Table<string | number>()
players.set("mia", "the best")
players.set("federer", 1)
players.set("djokovic", 2)
players.set("fav letter", "m")

console.log("mia:", players.get("mia"))
console.log("federer:", players.get("federer"))
console.log("length:", players.length)
for (let [key, value] of players) {
    console.log(`  ${key} = ${value}`)
}
console.log(formatSlots(players))

let numbers = new Table<number>()
let capacity = numbers.capacity
for (let i = 0; i < count; i++) {
    let result = numbers.set(`key-${i}`, i)
    if (!result.success) {
        console.error("insert failed:", result.error.message)
        break
    }
    if (numbers.capacity !== capacity) {
        capacity = numbers.capacity
        console.log(`grew to ${capacity} at ${numbers.length} entries:`, probeStats(numbers))
    }
}
console.log("final:", probeStats(numbers))
