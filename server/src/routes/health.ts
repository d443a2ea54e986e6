import type { Request, Response } from 'express'
import { SERVICE_NAME } from '../config/env'

export function rootHandler(_req: Request, res: Response): void {
  res.json({ message: 'Career Coach API is running' })
}

export function healthHandler(_req: Request, res: Response): void {
  res.json({
    status: 'ok',
    service: SERVICE_NAME,
    timestamp: new Date().toISOString()
  })
}
