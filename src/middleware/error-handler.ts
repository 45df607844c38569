import type { ErrorHandler } from 'hono'
import { HTTPException } from 'hono/http-exception'
import type { HonoEnv } from '../types/hono.types.js'
import { HttpError } from '../common/errors/http.error.js'
import { isTransferError } from '../common/errors/transfer.errors.js'

function statusOf(err: Error): number {
  if (err instanceof HttpError || err instanceof HTTPException) return err.status
  return 500
}

/**
 * Maps thrown errors to `{ error }` bodies. Messages of 5xx responses are never echoed.
 */
export function createErrorHandler(): ErrorHandler<HonoEnv> {
  return (err, c) => {
    const url = new URL(c.req.url)

    const statusCode = statusOf(err)
    const message = statusCode >= 500 ? 'Internal server error' : err.message
    const requestId = c.get('requestId')

    const logMeta = {
      requestId,
      method: c.req.method,
      path: url.pathname,
      statusCode,
      code: isTransferError(err) ? err.code : undefined,
      message: err.message,
      error: err.name,
    }

    const logger = c.get('logger')
    if (statusCode >= 500) {
      logger.error('Request failed', { ...logMeta, stack: err.stack })
    } else {
      logger.debug('Request rejected', logMeta)
    }

    return new Response(JSON.stringify({ error: message }), {
      status: statusCode,
      headers: {
        'content-type': 'application/json; charset=utf-8',
      },
    })
  }
}
