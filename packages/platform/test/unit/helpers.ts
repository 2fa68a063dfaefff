import net from 'node:net'

/** Let every queue drained on `setImmediate` run a few turns. */
export async function settle(turns = 10): Promise<void> {
  for (let i = 0; i < turns; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve))
  }
}

/** Poll `check` on timers until it holds; for work done by real sockets. */
export async function until(
  check: () => boolean | Promise<boolean>,
  timeoutMs = 2_000,
): Promise<void> {
  const deadline = Date.now() + timeoutMs
  while (!(await check())) {
    if (Date.now() > deadline) throw new Error('condition not met in time')
    await new Promise<void>((resolve) => setTimeout(resolve, 5))
  }
}

/** Whether a loopback TCP connect to `port` succeeds. */
export function connectable(port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = net.connect(port, '127.0.0.1')
    socket.once('connect', () => {
      socket.destroy()
      resolve(true)
    })
    socket.once('error', () => resolve(false))
  })
}
