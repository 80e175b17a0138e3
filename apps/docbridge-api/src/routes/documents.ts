import type { FastifyInstance } from 'fastify'
import { replySignal } from '@docbridge/gateway-core'
import { parseParams } from '@docbridge/docbridge'
import type { FrappeClient } from '@docbridge/docbridge'
import { doctypePathSchema, documentBodySchema, documentPathSchema, listQuerySchema } from './params'

export function registerDocumentRoutes(app: FastifyInstance, client: FrappeClient) {
  // GET /v1/documents/:doctype/:name — single document (cached)
  app.get('/v1/documents/:doctype/:name', async (request, reply) => {
    const { doctype, name } = parseParams(documentPathSchema, request.params)
    const doc = await client.getDocument({ identity: request.identity, signal: replySignal(reply) }, { doctype, name })
    return reply.send(doc)
  })

  // GET /v1/documents/:doctype — list, or text search with ?search=
  app.get('/v1/documents/:doctype', async (request, reply) => {
    const { doctype } = parseParams(doctypePathSchema, request.params)
    const query = parseParams(listQuerySchema, request.query)
    const ctx = { identity: request.identity, signal: replySignal(reply) }
    const params = {
      doctype,
      fields: query.fields,
      filters: query.filters,
      orderBy: query.order_by,
      limit: query.limit,
      start: query.start,
    }

    const list = query.search
      ? await client.searchDocuments(ctx, { ...params, search: query.search })
      : await client.getDocumentList(ctx, params)
    return reply.send(list)
  })

  // POST /v1/documents/:doctype — create
  app.post('/v1/documents/:doctype', async (request, reply) => {
    const { doctype } = parseParams(doctypePathSchema, request.params)
    const data = parseParams(documentBodySchema, request.body)
    const doc = await client.createDocument(
      { identity: request.identity, signal: replySignal(reply) },
      { doctype, data },
    )
    return reply.code(201).send(doc)
  })

  // PUT /v1/documents/:doctype/:name — update
  app.put('/v1/documents/:doctype/:name', async (request, reply) => {
    const { doctype, name } = parseParams(documentPathSchema, request.params)
    const data = parseParams(documentBodySchema, request.body)
    const doc = await client.updateDocument(
      { identity: request.identity, signal: replySignal(reply) },
      { doctype, name, data },
    )
    return reply.send(doc)
  })

  // DELETE /v1/documents/:doctype/:name
  app.delete('/v1/documents/:doctype/:name', async (request, reply) => {
    const { doctype, name } = parseParams(documentPathSchema, request.params)
    await client.deleteDocument({ identity: request.identity, signal: replySignal(reply) }, { doctype, name })
    return reply.code(204).send()
  })
}
