const dispatch = Symbol('Dispatch event')

/**
 * Create an emitter and the function dispatching on it.
 *
 * Only the holder of `dispatch` can emit events.
 * A throwing listener does not prevent other listeners from receiving the event,
 * the error is handed to `onListenerError`.
 */
export function createEventEmitter<EventMap>(
    onListenerError?: (error: unknown, type: keyof EventMap) => void,
) {
    const emitter = new EventEmitter<EventMap>(onListenerError)

    return [emitter, getEventDispatch(emitter)] as const
}

export function getEventDispatch<EventMap>(
    emitter: EventEmitter<EventMap>,
) {
    return emitter[dispatch].bind(emitter)
}

export class EventEmitter<EventMap> {
    constructor(
        onListenerError?: (error: unknown, type: keyof EventMap) => void,
    ) {
        this.#onListenerError = onListenerError
    }

    [dispatch]<K extends keyof EventMap>(type: K, init: EventMap[K]) {
        const event = { type, ...init }
        this.#listeners[type]?.forEach(l => {
            try {
                l(event)
            } catch (e) {
                if (!this.#onListenerError) {
                    throw e
                }
                this.#onListenerError(e, type)
            }
        })
    }

    #onListenerError?: (error: unknown, type: keyof EventMap) => void
    #listeners: {
        [K in keyof EventMap]?: Set<EventHandler<EventMap, K>>
    } = {}

    addListener<K extends keyof EventMap>(type: K, handler: EventHandler<EventMap, K>) {
        this.#listeners[type] ??= new Set<EventHandler<EventMap, K>>()
        this.#listeners[type]?.add(handler)

        return () => this.removeListener(type, handler)
    }

    removeListener<K extends keyof EventMap>(type: K, handler: EventHandler<EventMap, K>) {
        this.#listeners[type]?.delete(handler)
    }

    once<K extends keyof EventMap>(type: K, handler: EventHandler<EventMap, K>) {
        const h: EventHandler<EventMap, K> = e => {
            this.removeListener(type, h)
            handler(e)
        }
        this.addListener(type, h)

        return () => this.removeListener(type, h)
    }

    listenerCount(type: keyof EventMap) {
        return this.#listeners[type]?.size ?? 0
    }
}

export type Event<EventMap, K extends keyof EventMap> = {
    type: K
} & EventMap[K]

export type EventHandler<EventMap, K extends keyof EventMap> = (event: Event<EventMap, K>) => void
