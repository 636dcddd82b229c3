import { AsyncQueue } from './AsyncQueue.js'

describe('AsyncQueue', () => {
  let queue: AsyncQueue<number>

  beforeEach(() => {
    queue = new AsyncQueue<number>()
  })

  it('should enqueue and dequeue items', async () => {
    const promise = queue.enqueue()
    queue.dequeue(() => 1)
    const result = await promise
    expect(result).toEqual(1)
  })

  it('should report whether a waiter was served', () => {
    expect(queue.dequeue(() => 1)).toBe(false)
    void queue.enqueue()
    expect(queue.dequeue(() => 1)).toBe(true)
    expect(queue.dequeue(() => 1)).toBe(false)
  })

  it('should serve waiters in order', async () => {
    const first = queue.enqueue()
    const second = queue.enqueue()
    let next = 0
    while (queue.dequeue(() => ++next)) {
      // drain
    }
    expect(await Promise.all([first, second])).toEqual([1, 2])
  })

  it('should pass the request to the producer', async () => {
    const sized = new AsyncQueue<string, number>()
    const pending = sized.enqueue(3)
    sized.dequeue(max => 'abcdef'.slice(0, max))
    expect(await pending).toEqual('abc')
  })
})
