export type OpResult<T = void, E extends Error = Error> =
    | {
        success: true
        value: T
    }
    | {
        success: false
        error: E
    }

export function opSuccess<T = void>(value: T): OpResult<T, never> {
    return { success: true, value }
}

export function opFailure<E extends Error>(error: E): OpResult<never, E> {
    return { success: false, error }
}
