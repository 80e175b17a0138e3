import type { FastifyInstance } from 'fastify'
import { z } from 'zod'
import { replySignal } from '@docbridge/gateway-core'
import { parseParams } from '@docbridge/docbridge'
import type { FrappeClient } from '@docbridge/docbridge'
import { aggregationBodySchema, reportBodySchema } from './params'

const reportPathSchema = z.object({ reportName: z.string() })

export function registerQueryRoutes(app: FastifyInstance, client: FrappeClient) {
  // POST /v1/aggregations — grouped get_list
  app.post('/v1/aggregations', async (request, reply) => {
    const body = parseParams(aggregationBodySchema, request.body)
    const rows = await client.runAggregationQuery(
      { identity: request.identity, signal: replySignal(reply) },
      {
        doctype: body.doctype,
        fields: body.fields,
        filters: body.filters,
        groupBy: body.group_by,
        orderBy: body.order_by,
        limit: body.limit,
      },
    )
    return reply.send({ data: rows })
  })

  // POST /v1/reports/:reportName — run a query report
  app.post('/v1/reports/:reportName', async (request, reply) => {
    const { reportName } = parseParams(reportPathSchema, request.params)
    const body = parseParams(reportBodySchema, request.body)
    const report = await client.runReport(
      { identity: request.identity, signal: replySignal(reply) },
      { reportName, filters: body.filters, user: body.user },
    )
    return reply.send(report)
  })
}
