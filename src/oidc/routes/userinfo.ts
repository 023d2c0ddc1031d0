/**
 * UserInfo route
 *
 * - GET|POST /userinfo
 */

import { Hono } from 'hono'
import type { Context } from 'hono'
import type { HttpInfo } from '../userinfo'
import type { ServerContext } from './context'

export function createUserInfoRoutes(ctx: ServerContext): Hono {
  const app = new Hono()

  const handle = async (c: Context): Promise<Response> => {
    const body: Record<string, unknown> = c.req.method === 'POST' ? await c.req.parseBody() : {}
    const httpInfo: HttpInfo = { headers: c.req.header(), query: c.req.query(), body }

    const request = ctx.userinfo.parseRequest(body, httpInfo)
    const result = await ctx.userinfo.processRequest(request, httpInfo)
    const response = await ctx.userinfo.doResponse(request, result)

    return new Response(response.body, { status: response.status, headers: response.headers })
  }

  app.get('/userinfo', handle)
  app.post('/userinfo', handle)

  return app
}
