import { describe, it, expect } from 'vitest'
import { RingBuffer } from './ring-buffer.js'

describe('RingBuffer', () => {
  it('should reject a capacity that is not a positive integer', () => {
    expect(() => new RingBuffer(0)).toThrow(RangeError)
    expect(() => new RingBuffer(2.5)).toThrow('Ring buffer capacity must be a positive integer, got 2.5')
  })

  it('should evict the oldest item when full', () => {
    const buffer = new RingBuffer<number>(3)

    expect(buffer.push(1)).toBeUndefined()
    buffer.push(2)
    buffer.push(3)
    expect(buffer.push(4)).toBe(1)

    expect(buffer.toArray()).toEqual([2, 3, 4])
    expect(buffer.length).toBe(3)
    expect(buffer.latest()).toBe(4)
  })

  it('should return copies from toArray', () => {
    const buffer = new RingBuffer<string>(2)
    buffer.push('a')

    const items = buffer.toArray()
    items.push('b')

    expect(buffer.length).toBe(1)
  })

  it('should return the newest items from tail', () => {
    const buffer = new RingBuffer<number>(5)
    ;[1, 2, 3, 4].forEach(n => buffer.push(n))

    expect(buffer.tail(2)).toEqual([3, 4])
    expect(buffer.tail(10)).toEqual([1, 2, 3, 4])
    expect(buffer.tail(0)).toEqual([])
  })

  it('should empty on clear', () => {
    const buffer = new RingBuffer<number>(2)
    buffer.push(1)
    buffer.clear()

    expect(buffer.length).toBe(0)
    expect(buffer.latest()).toBeUndefined()
  })
})
