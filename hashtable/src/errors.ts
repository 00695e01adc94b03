export class TableError extends Error {
    constructor(message: string) {
        super(message)
        this.name = new.target.name
    }
}

// growth refused or initial capacity beyond the configured limit
export class AllocationFailure extends TableError { }

// caller broke a contract of the table
export class InvariantViolation extends TableError { }

export function invariant(condition: boolean, message: string): asserts condition {
    if (!condition) {
        throw new InvariantViolation(message)
    }
}
