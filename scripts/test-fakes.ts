import type { DbRow, FetchLike, QueryResultLike, Queryable } from '../src/lib/types'

export interface RecordedQuery {
  text: string
  values: unknown[]
}

type Responder = (text: string, values: unknown[]) => QueryResultLike | undefined

/** In-process stand-in for a pg client: records statements, answers from a responder. */
export class FakeDb implements Queryable {
  readonly queries: RecordedQuery[] = []

  constructor(private readonly responder: Responder = () => undefined) {}

  async query(text: string, values: unknown[] = []): Promise<QueryResultLike> {
    this.queries.push({ text, values })
    return this.responder(text, values) ?? { rows: [], rowCount: 0 }
  }

  matching(pattern: RegExp): RecordedQuery[] {
    return this.queries.filter((q) => pattern.test(q.text))
  }

  /** Statement keywords in order: BEGIN, INSERT, UPDATE, COMMIT… */
  verbs(): string[] {
    return this.queries.map((q) => q.text.trim().split(/\s+/)[0].toUpperCase())
  }
}

export function rows(...items: DbRow[]): QueryResultLike {
  return { rows: items, rowCount: items.length }
}

export interface RecordedRequest {
  url: string
  method: string
  headers: Record<string, string>
  body: string
}

export type FakeReply = { status: number; body: string; statusText?: string } | Error

/** Scripted fetch: replies are consumed in order, or chosen by a function of the request. */
export function scriptedFetch(
  replies: FakeReply[] | ((request: RecordedRequest) => FakeReply)
): { fetchImpl: FetchLike; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = []
  const queue = Array.isArray(replies) ? [...replies] : null

  const fetchImpl: FetchLike = async (input, init) => {
    const headers: Record<string, string> = {}
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value
    })
    const request: RecordedRequest = {
      url: input.toString(),
      method: init?.method ?? 'GET',
      headers,
      body: typeof init?.body === 'string' ? init.body : '',
    }
    requests.push(request)

    const reply = queue ? queue.shift() : typeof replies === 'function' ? replies(request) : undefined
    if (!reply) throw new Error(`unexpected request to ${request.url}`)
    if (reply instanceof Error) throw reply
    return new Response(reply.body, { status: reply.status, statusText: reply.statusText ?? '' })
  }

  return { fetchImpl, requests }
}

export function formFields(body: string): Record<string, string> {
  return Object.fromEntries(new URLSearchParams(body))
}
