import { createEventBus } from '@fieldops/events/index'

describe('Event bus - in-process delivery', () => {
  test('delivers payloads to every handler with the container resolver', async () => {
    const calls: Array<{ payload: unknown; resolved: unknown }> = []
    const bus = createEventBus({ resolve: jest.fn().mockImplementation((name: string) => `resolved:${name}`) })
    bus.on('demo', async (payload, ctx) => {
      calls.push({ payload, resolved: ctx.resolve('recordRepository') })
    })

    await bus.emit('demo', { id: 'a-1' })

    expect(calls).toEqual([{ payload: { id: 'a-1' }, resolved: 'resolved:recordRepository' }])
  })

  test('keeps delivering after a handler throws', async () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined)
    const received: string[] = []
    const bus = createEventBus({ resolve: jest.fn() })
    bus.on('demo', () => {
      throw new Error('boom')
    })
    bus.on('demo', () => {
      received.push('second')
    })

    await bus.emit('demo', {})

    expect(received).toEqual(['second'])
    expect(errorSpy).toHaveBeenCalledWith('[events] Handler error for "demo":', expect.any(Error))
    errorSpy.mockRestore()
  })

  test('registers module subscribers and removes handlers', async () => {
    const handler = jest.fn()
    const bus = createEventBus({ resolve: jest.fn() })
    bus.registerModuleSubscribers([{ id: 'demo:listener', event: 'demo', handler }])

    await bus.emit('demo', { id: '1' })
    bus.off('demo', handler)
    await bus.emit('demo', { id: '2' })

    expect(handler).toHaveBeenCalledTimes(1)
    expect(handler).toHaveBeenCalledWith({ id: '1' }, expect.objectContaining({ resolve: expect.any(Function) }))
  })
})
