const encoder = new TextEncoder()

const SEED = 5381n

// source: http://www.cse.yorku.ca/~oz/hash.html
// hash * 33 + byte over the UTF-8 encoding, wrapping at 64 bits
export function djb2(key: string): bigint {
    let hash = SEED
    for (const byte of encoder.encode(key)) {
        hash = BigInt.asUintN(64, (hash << 5n) + hash + BigInt(byte))
    }
    return hash
}

// capacity must be a power of two
export function homeSlot(hash: bigint, capacity: number): number {
    return Number(hash & BigInt(capacity - 1))
}
