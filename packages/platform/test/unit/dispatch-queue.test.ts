import { describe, expect, it } from 'vitest'
import { DispatchQueue } from '../../src'
import { settle } from './helpers'

describe('DispatchQueue', () => {
  it('should run tasks in submission order', async () => {
    const queue = new DispatchQueue('test.order')
    const order: number[] = []

    queue.async(() => order.push(1))
    queue.async(() => order.push(2))
    expect(order).toEqual([])

    await settle()
    expect(order).toEqual([1, 2])
  })

  it('should report whether the caller is on the queue', async () => {
    const queue = new DispatchQueue('test.current')
    const other = new DispatchQueue('test.other')
    const seen: boolean[] = []

    queue.async(() => {
      seen.push(queue.isCurrent)
      seen.push(other.isCurrent)
    })
    await settle()

    expect(queue.isCurrent).toBe(false)
    expect(seen).toEqual([true, false])
  })
})
