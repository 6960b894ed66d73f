export type Deferred<T> = {
    readonly promise: Promise<T>
    resolve(value: T | PromiseLike<T>): void
    reject(reason: unknown): void
}

const unassigned = () => { throw new Error('Uninitialized') }

export function deferred<T>(): Deferred<T> {
    let resolve: Deferred<T>['resolve'] = unassigned
    let reject: Deferred<T>['reject'] = unassigned
    const promise = new Promise<T>((res, rej) => {
        resolve = res
        reject = rej
    })
    return {promise, resolve, reject}
}
