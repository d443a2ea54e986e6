import type { Server } from 'node:http'
import type { Socket } from 'node:net'
import { logger } from '../logger'

export function createDrainManager(server: Server, timeoutMs = 10_000) {
  const sockets = new Set<Socket>()

  server.on('connection', (socket) => {
    sockets.add(socket)
    socket.on('close', () => sockets.delete(socket))
  })

  const drain = async () => {
    logger.info({ openSockets: sockets.size }, 'Draining connections')

    await new Promise<void>((resolve) => {
      const timeout = setTimeout(() => {
        logger.warn({ openSockets: sockets.size }, 'Force closing lingering sockets after drain timeout')
        sockets.forEach((socket) => socket.destroy())
        resolve()
      }, timeoutMs)

      // Stop accepting new connections; the callback fires once open ones finish.
      server.close(() => {
        clearTimeout(timeout)
        resolve()
      })
    })
  }

  return { drain }
}
