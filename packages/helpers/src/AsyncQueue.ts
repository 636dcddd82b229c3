interface Waiter<T, TRequest> {
  request: TRequest
  resolve: (value: T) => void
}

/**
 * A queue of pending requests, each parked on a promise until a producer
 * has something to hand over.
 *
 * The request value travels with the waiter so the producer can tailor what
 * it hands back (e.g. the maximum number of bytes a reader will accept).
 */
export class AsyncQueue<T, TRequest = void> {
  private readonly items: Waiter<T, TRequest>[] = []

  enqueue(request: TRequest) {
    return new Promise<T>(resolve => {
      this.items.push({ request, resolve })
    })
  }

  dequeue(fetch: (request: TRequest) => T) {
    const waiter = this.items.shift()
    if (waiter) {
      waiter.resolve(fetch(waiter.request))
    }

    return !!waiter
  }
}
